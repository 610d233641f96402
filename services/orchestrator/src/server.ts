import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import { createRunsRouter } from "./routes/runs";
import { logger as rootLogger, moduleLogger, requestIdMiddleware, requestLoggerMiddleware, type Logger } from "./observability/logger";
import { initDefaultMetrics, metricsMiddleware, register } from "./observability/metrics";
import { loadConfig } from "./config";
import { createRepository } from "./repo";
import type { RunRepository } from "./repo/types";
import { createCoordinationStore } from "./coordination";
import type { CoordinationStore } from "./coordination/store";
import { runKeys } from "./coordination/keys";

export interface AppDeps {
  runs: RunRepository;
  store: CoordinationStore;
  /** Empty disables auth. */
  apiKey?: string;
  /** Empty allows any origin. */
  corsOrigins?: string[];
  instanceId?: string;
  logger?: Logger;
  followPollMs?: number;
}

const defaultAllowedHeaders = ["Content-Type", "Accept", "Origin", "X-Requested-With", "Authorization", "x-api-key"];

function corsOptionsFor(origins: string[]): cors.CorsOptions {
  if (origins.length === 0) {
    return { origin: true, allowedHeaders: defaultAllowedHeaders, credentials: false };
  }
  const allowed = new Set(origins);
  return {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // non-browser clients send no Origin
      if (!origin) return callback(null, true);
      if (allowed.has(origin)) return callback(null, true);
      return callback(new Error("Not allowed by CORS"));
    },
    allowedHeaders: defaultAllowedHeaders,
    credentials: false
  };
}

const isExemptPath = (req: Request): boolean => {
  if (req.method === "OPTIONS") return true;
  if (req.method === "GET") {
    const p = req.path;
    if (p === "/health" || p === "/ready" || p === "/metrics") return true;
  }
  return false;
};

function authMiddleware(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey || isExemptPath(req)) return next();

    const authHeader = req.header("authorization");
    let bearerToken: string | undefined;
    if (authHeader && authHeader.toLowerCase().startsWith("bearer ")) {
      bearerToken = authHeader.substring(7).trim();
    }
    if (bearerToken === apiKey || req.header("x-api-key") === apiKey) return next();

    res.status(401).json({ error: "unauthorized" });
  };
}

/**
 * Ops surface of a worker instance: probes, metrics, and read/stop access to runs.
 * Runs themselves are started by the job queue, not over HTTP.
 */
export function createApp(deps: AppDeps): Express {
  const log = deps.logger ?? moduleLogger("http");
  initDefaultMetrics();

  const app = express();
  app.use(cors(corsOptionsFor(deps.corsOrigins ?? [])));
  app.use(express.json());
  app.use(requestIdMiddleware());
  app.use(requestLoggerMiddleware(log));
  app.use(metricsMiddleware());
  app.use(authMiddleware(deps.apiKey ?? ""));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "orchestrator", instanceId: deps.instanceId });
  });

  // ready once the shared store answers
  app.get("/ready", async (_req, res) => {
    try {
      await deps.store.get(runKeys.health(deps.instanceId ?? "probe"));
      res.status(200).json({ ok: true });
    } catch (err) {
      log.warn({ err }, "readiness check failed");
      res.status(503).json({ ok: false });
    }
  });

  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", register.contentType);
    res.send(await register.metrics());
  });

  app.use("/runs", createRunsRouter({ runs: deps.runs, store: deps.store, logger: log, pollMs: deps.followPollMs }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error({ err, method: req.method, path: req.path }, "unhandled request error");
    if (res.headersSent) return res.end();
    return res.status(500).json({ error: "internal error" });
  });

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  rootLogger.level = config.logLevel;
  const app = createApp({
    runs: createRepository(config.redisUrl),
    store: createCoordinationStore(config.redisUrl),
    apiKey: config.apiKey,
    corsOrigins: config.corsOrigins,
    instanceId: config.coordinator.instanceId
  });
  app.listen(config.port, () => {
    rootLogger.info({ port: config.port, instanceId: config.coordinator.instanceId }, "orchestrator listening");
  });
}
