import type { ControlSignal, ResponseEvent, RunStatus, TerminalRunStatus } from "../types";
import { isTerminalStatus } from "../types";
import type { CoordinatorSettings } from "../config";
import type { RunRepository } from "../repo/types";
import { LockContentionError, errorMessage } from "../errors";
import { moduleLogger, type Logger } from "../observability/logger";
import { lockContention, runsFinished, runsStarted } from "../observability/metrics";
import type { RunInvocation } from "./invocation";
import { runKeys } from "./keys";
import { settlesWithin, withRetry } from "./retry";
import { StopWatcher } from "./stopWatcher";
import type { CoordinationStore, Subscription } from "./store";
import { TranscriptWriter, readTranscript } from "./transcript";

/** Produces the events of one run; must stop calling the model once `signal` aborts. */
export type TurnSource = (invocation: RunInvocation, signal: AbortSignal) => AsyncIterable<ResponseEvent>;

export type ExecutionOutcome =
  | { outcome: "executed"; runId: string; status: TerminalRunStatus; events: number; error?: string }
  | { outcome: "duplicate"; runId: string; owner: string | null }
  | { outcome: "already-finished"; runId: string; status: RunStatus };

export interface RunCoordinatorDeps {
  store: CoordinationStore;
  runs: RunRepository;
  turns: TurnSource;
  settings: CoordinatorSettings;
  logger?: Logger;
}

export const COMPLETED_EVENT: ResponseEvent = {
  type: "status",
  status: "completed",
  message: "Agent run completed successfully"
};

export function controlSignalFor(status: TerminalRunStatus): ControlSignal {
  if (status === "completed") return "END_STREAM";
  if (status === "failed") return "ERROR";
  return "STOP";
}

/**
 * Executes runs so that at most one instance works on a given run at a time.
 * Only the lock holder appends to the run's transcript; everyone else reads it.
 */
export class RunCoordinator {
  private readonly log: Logger;

  constructor(private readonly deps: RunCoordinatorDeps) {
    this.log = deps.logger ?? moduleLogger("coordinator");
  }

  get instanceId(): string {
    return this.deps.settings.instanceId;
  }

  private async acquire(runId: string): Promise<void> {
    const { store, settings } = this.deps;
    const key = runKeys.lock(runId);
    if (await store.setIfAbsent(key, settings.instanceId, settings.lockTtlSeconds)) return;

    const owner = await store.get(key);
    if (owner) throw new LockContentionError(runId, owner);

    // the lock existed without a readable owner (expired or released in between)
    if (await store.setIfAbsent(key, settings.instanceId, settings.lockTtlSeconds)) return;
    throw new LockContentionError(runId, null);
  }

  async execute(invocation: RunInvocation): Promise<ExecutionOutcome> {
    const { runId } = invocation;
    const { store, runs, settings } = this.deps;
    const log = this.log.child({
      runId,
      threadId: invocation.threadId,
      instanceId: settings.instanceId,
      requestId: invocation.requestId
    });

    try {
      await this.acquire(runId);
    } catch (err) {
      if (err instanceof LockContentionError) {
        lockContention.inc();
        log.info({ owner: err.owner }, "run already being processed, skipping duplicate execution");
        return { outcome: "duplicate", runId, owner: err.owner };
      }
      throw err;
    }

    const writer = new TranscriptWriter(store, runId, log, {
      attempts: settings.statusUpdateAttempts,
      baseDelayMs: settings.statusUpdateBackoffMs
    });
    let subscription: Subscription | null = null;
    let watcher: StopWatcher | null = null;
    let status: RunStatus = "running";
    let error: string | undefined;
    let events = 0;
    const startedAt = Date.now();

    try {
      const existing = await runs.getRun(runId);
      if (existing && isTerminalStatus(existing.status)) {
        log.info({ status: existing.status }, "run already finished, skipping redelivered invocation");
        return { outcome: "already-finished", runId, status: existing.status };
      }

      runsStarted.inc();
      log.info({ model: invocation.model }, "starting run");

      subscription = await store.subscribe([runKeys.instanceControl(runId, settings.instanceId), runKeys.control(runId)]);
      watcher = new StopWatcher({
        subscription,
        store,
        livenessKey: runKeys.liveness(settings.instanceId, runId),
        livenessTtlSeconds: settings.livenessTtlSeconds,
        pollIntervalMs: settings.stopPollIntervalMs,
        refreshIntervalMs: settings.livenessRefreshIntervalMs,
        logger: log
      });
      watcher.start();
      await store.set(runKeys.liveness(settings.instanceId, runId), "running", settings.livenessTtlSeconds);

      for await (const event of this.deps.turns(invocation, watcher.signal)) {
        if (watcher.stopRequested) {
          log.info("run stopped by signal");
          status = "stopped";
          break;
        }
        writer.append(event);
        events++;

        if (event.type === "status") {
          if (event.status === "completed" || event.status === "failed" || event.status === "stopped") {
            log.info({ status: event.status }, "run finished via status event");
            status = event.status;
            if (event.status !== "completed") {
              error = event.message ?? `Run ended with status: ${event.status}`;
            }
            break;
          }
          if (event.status === "error") {
            status = "failed";
            error = event.message ?? "Run failed";
            break;
          }
        }
      }

      if (status === "running" && watcher.stopRequested) status = "stopped";
      if (status === "running") {
        status = "completed";
        log.info({ durationMs: Date.now() - startedAt, events }, "run completed normally");
        writer.append(COMPLETED_EVENT);
        events++;
      }

      await this.finalize(runId, status, error, writer, log);
    } catch (err) {
      error = errorMessage(err);
      status = "failed";
      log.error({ err, durationMs: Date.now() - startedAt }, "run failed");
      writer.append({ type: "status", status: "error", message: error });
      events++;
      const diagnostic = err instanceof Error && err.stack ? err.stack : error;
      await this.finalize(runId, "failed", diagnostic, writer, log);
    } finally {
      await this.cleanup(runId, watcher, subscription, writer, log);
      log.info({ status }, "run task fully completed");
    }

    return isTerminalStatus(status)
      ? { outcome: "executed", runId, status, events, error }
      : { outcome: "executed", runId, status: "failed", events, error };
  }

  private async finalize(
    runId: string,
    status: TerminalRunStatus,
    error: string | undefined,
    writer: TranscriptWriter,
    log: Logger
  ): Promise<void> {
    const { store, runs, settings } = this.deps;
    await writer.idle();

    let transcript: ResponseEvent[];
    try {
      transcript = (await readTranscript(store, runId, log)).events;
    } catch (err) {
      log.error({ err }, "failed to read transcript, persisting local copy");
      transcript = [...writer.entries];
    }

    try {
      const result = await withRetry(
        "run status update",
        async () => {
          const outcome = await runs.completeRun(runId, {
            status,
            error,
            transcript,
            completedAt: new Date().toISOString()
          });
          if (outcome === "not-found") throw new Error(`run ${runId} not found`);
          return outcome;
        },
        {
          attempts: settings.statusUpdateAttempts,
          baseDelayMs: settings.statusUpdateBackoffMs,
          onRetry: (attempt, err) => log.warn({ attempt, err: errorMessage(err) }, "retrying run status update")
        }
      );
      log.info({ status, result, droppedEntries: writer.failures }, "run status persisted");
    } catch (err) {
      log.error({ err, status }, "failed to persist final run status");
    }
    runsFinished.labels(status).inc();

    const signal = controlSignalFor(status);
    try {
      await store.publish(runKeys.control(runId), signal);
    } catch (err) {
      log.warn({ signal, err: errorMessage(err) }, "failed to publish final control signal");
    }
  }

  private async cleanup(
    runId: string,
    watcher: StopWatcher | null,
    subscription: Subscription | null,
    writer: TranscriptWriter,
    log: Logger
  ): Promise<void> {
    const { store, settings } = this.deps;

    // closing the subscription wakes a watcher blocked in next()
    const halting = watcher ? watcher.halt() : null;
    if (subscription) {
      try {
        await subscription.close();
      } catch (err) {
        log.warn({ err: errorMessage(err) }, "error closing control subscription");
      }
    }
    if (halting) await halting;

    const steps: Array<[string, () => Promise<unknown>]> = [
      ["set transcript retention", () => store.expire(runKeys.transcript(runId), settings.transcriptRetentionSeconds)],
      ["delete liveness key", () => store.delete(runKeys.liveness(settings.instanceId, runId))],
      ["release run lock", () => this.release(runId)]
    ];
    for (const [step, run] of steps) {
      try {
        await run();
      } catch (err) {
        log.warn({ step, err: errorMessage(err) }, "cleanup step failed");
      }
    }

    if (!(await settlesWithin(writer.idle(), settings.pendingWritesTimeoutMs))) {
      log.warn({ timeoutMs: settings.pendingWritesTimeoutMs }, "timeout waiting for pending transcript writes");
    }
  }

  private async release(runId: string): Promise<void> {
    const { store, settings } = this.deps;
    const key = runKeys.lock(runId);
    const owner = await store.get(key);
    if (owner === settings.instanceId) {
      await store.delete(key);
    } else if (owner) {
      this.log.warn({ runId, owner }, "run lock now held by another instance, leaving it");
    }
  }
}
