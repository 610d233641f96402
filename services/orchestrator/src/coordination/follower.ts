import type { ResponseEvent } from "../types";
import { isTerminalStatus } from "../types";
import type { RunRepository } from "../repo/types";
import { moduleLogger, type Logger } from "../observability/logger";
import { runKeys } from "./keys";
import type { CoordinationStore } from "./store";
import { readTranscript } from "./transcript";

export interface FollowOptions {
  signal?: AbortSignal;
  /** Upper bound between transcript reads when no notification arrives. */
  pollMs?: number;
  logger?: Logger;
}

const TERMINAL_SIGNALS = new Set(["END_STREAM", "ERROR", "STOP"]);

function endsRun(event: ResponseEvent): boolean {
  return (
    event.type === "status" &&
    (event.status === "completed" || event.status === "failed" || event.status === "stopped" || event.status === "error")
  );
}

/**
 * Streams a run's events to a late subscriber: the whole transcript so far,
 * then new entries as the executing instance appends them. Notifications only
 * trigger a re-read; the transcript list is the source of truth.
 */
export async function* followRun(
  store: CoordinationStore,
  runs: RunRepository,
  runId: string,
  options: FollowOptions = {}
): AsyncGenerator<ResponseEvent, void, undefined> {
  const log = (options.logger ?? moduleLogger("follower")).child({ runId });
  const pollMs = options.pollMs ?? 1000;

  const run = await runs.getRun(runId);
  if (run && isTerminalStatus(run.status)) {
    yield* run.transcript;
    return;
  }

  // subscribe before the first read so nothing appended in between is missed
  const subscription = await store.subscribe([runKeys.notify(runId), runKeys.control(runId)]);
  let index = 0;
  let delivered = 0;
  // a stop leaves no closing event, and its signal may have gone out before the subscription
  let checkRepository = true;
  try {
    for (;;) {
      if (checkRepository) {
        const current = await runs.getRun(runId);
        if (current && isTerminalStatus(current.status)) {
          yield* current.transcript.slice(delivered);
          log.debug({ status: current.status }, "run already finished");
          return;
        }
        checkRepository = false;
      }

      const page = await readTranscript(store, runId, log, index);
      index = page.nextIndex;
      for (const event of page.events) {
        yield event;
        delivered++;
        if (endsRun(event)) return;
      }

      if (options.signal?.aborted) return;
      const msg = await subscription.next(pollMs);
      if (!msg) {
        checkRepository = true;
      } else if (msg.channel === runKeys.control(runId) && TERMINAL_SIGNALS.has(msg.message)) {
        // drain what the executor wrote before signalling
        const rest = await readTranscript(store, runId, log, index);
        yield* rest.events;
        log.debug({ signal: msg.message }, "run ended");
        return;
      }
    }
  } finally {
    await subscription.close();
  }
}
