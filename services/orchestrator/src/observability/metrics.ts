import { Registry, collectDefaultMetrics, Counter, Histogram } from "prom-client";
import type { Request, Response, NextFunction } from "express";

/**
 * Custom Registry so we can expose default + custom metrics on /metrics
 */
export const register = new Registry();

export const httpRequestDurationSeconds = new Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [register],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5]
});

export const runsStarted = new Counter({
  name: "agent_runs_started_total",
  help: "Runs this instance acquired and started executing",
  registers: [register]
});

export const runsFinished = new Counter({
  name: "agent_runs_finished_total",
  help: "Runs this instance finished, by final status",
  labelNames: ["status"] as const,
  registers: [register]
});

export const lockContention = new Counter({
  name: "agent_run_lock_contention_total",
  help: "Run invocations skipped because another instance held the lock",
  registers: [register]
});

export const compressionRounds = new Histogram({
  name: "context_compression_rounds",
  help: "Threshold-halving rounds used per compression",
  registers: [register],
  buckets: [0, 1, 2, 3, 4, 5]
});

export const autoContinues = new Counter({
  name: "turn_auto_continues_total",
  help: "Silent continuations after a tool-calls finish",
  registers: [register]
});

export const overloadFallbacks = new Counter({
  name: "turn_overload_fallbacks_total",
  help: "Sub-iterations retried on a fallback route after provider overload",
  registers: [register]
});

let defaultsStarted = false;

/**
 * Initialize collection of default Node/process metrics on the custom registry.
 * Safe to call more than once.
 */
export function initDefaultMetrics(): void {
  if (defaultsStarted) return;
  defaultsStarted = true;
  collectDefaultMetrics({ register });
}

/**
 * Express middleware that measures request duration and records into the histogram.
 * Uses req.route?.path when available, otherwise falls back to req.path.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime();
    res.on("finish", () => {
      const diff = process.hrtime(start);
      const durationSeconds = diff[0] + diff[1] / 1e9;
      const routePath: unknown = req.route?.path;
      const route = typeof routePath === "string" ? routePath : req.path;
      httpRequestDurationSeconds.labels(req.method, route, String(res.statusCode)).observe(durationSeconds);
    });
    next();
  };
}
