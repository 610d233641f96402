import { Router } from "express";
import type { RunRepository } from "../repo/types";
import type { CoordinationStore } from "../coordination/store";
import { followRun } from "../coordination/follower";
import { runKeys } from "../coordination/keys";
import { isTerminalStatus, type ResponseEvent } from "../types";
import { moduleLogger, type Logger } from "../observability/logger";

export interface RunsRouterDeps {
  runs: RunRepository;
  store: CoordinationStore;
  logger?: Logger;
  /** Follower wake-up bound while no notification arrives. */
  pollMs?: number;
  heartbeatMs?: number;
}

export function createRunsRouter(deps: RunsRouterDeps): Router {
  const { runs, store } = deps;
  const log = deps.logger ?? moduleLogger("runs-router");
  const router = Router();

  // GET /runs/:runId -> the persisted run or 404
  router.get("/:runId", async (req, res, next) => {
    try {
      const run = await runs.getRun(req.params.runId);
      if (!run) return res.status(404).json({ error: "run not found" });
      return res.status(200).json({ run });
    } catch (err) {
      return next(err);
    }
  });

  // GET /runs/:runId/events -> transcript replay, then live events until the run ends
  router.get("/:runId/events", async (req, res, next) => {
    const { runId } = req.params;
    let exists: boolean;
    try {
      exists = (await runs.getRun(runId)) !== null;
    } catch (err) {
      return next(err);
    }
    if (!exists) return res.status(404).end();

    res.set({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive"
    });
    res.flushHeaders();

    const send = (event: ResponseEvent) => {
      res.write(`event: ${event.type}\n`);
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    const abort = new AbortController();
    const heartbeat = setInterval(() => {
      res.write(`: keep-alive ${Date.now()}\n\n`);
    }, deps.heartbeatMs ?? 15000);
    res.on("close", () => {
      clearInterval(heartbeat);
      abort.abort();
    });

    try {
      for await (const event of followRun(store, runs, runId, {
        signal: abort.signal,
        pollMs: deps.pollMs,
        logger: log
      })) {
        if (abort.signal.aborted) break;
        send(event);
      }
      if (!abort.signal.aborted) res.write("event: end\ndata: {}\n\n");
    } catch (err) {
      log.error({ err, runId }, "event stream failed");
      if (!abort.signal.aborted) res.write(`event: error\ndata: ${JSON.stringify({ error: "stream failed" })}\n\n`);
    } finally {
      clearInterval(heartbeat);
      res.end();
    }
  });

  // DELETE /runs/:runId -> ask whichever instance owns the run to stop it
  router.delete("/:runId", async (req, res, next) => {
    const { runId } = req.params;
    try {
      const run = await runs.getRun(runId);
      if (!run) return res.status(404).json({ error: "run not found" });

      if (isTerminalStatus(run.status)) {
        return res.status(409).json({
          error: "invalid status transition",
          from: run.status,
          to: "stopped"
        });
      }

      await store.publish(runKeys.control(runId), "STOP");
      log.info({ runId }, "stop requested");
      return res.status(202).json({ ok: true, runId, signal: "STOP" });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
