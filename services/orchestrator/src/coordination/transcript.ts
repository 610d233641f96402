import type { ResponseEvent } from "../types";
import type { Logger } from "../observability/logger";
import { errorMessage } from "../errors";
import { isResponseEvent, parseJson } from "../validation/schemas";
import { NEW_DATA, runKeys } from "./keys";
import { withRetry } from "./retry";
import type { CoordinationStore } from "./store";

export interface TranscriptWriterOptions {
  attempts: number;
  baseDelayMs: number;
}

/**
 * Serialized appends to a run's durable transcript. Each entry is followed by
 * a payload-free notification on the run's notify channel. `append` does not
 * wait; `idle()` resolves once everything queued so far has been written.
 */
export class TranscriptWriter {
  private tail: Promise<void> = Promise.resolve();
  private readonly written: ResponseEvent[] = [];
  private failed = 0;

  constructor(
    private readonly store: CoordinationStore,
    private readonly runId: string,
    private readonly log: Logger,
    private readonly options: TranscriptWriterOptions
  ) {}

  append(event: ResponseEvent): void {
    const payload = JSON.stringify(event);
    this.tail = this.tail.then(async () => {
      try {
        await withRetry("transcript append", () => this.store.append(runKeys.transcript(this.runId), payload), {
          attempts: this.options.attempts,
          baseDelayMs: this.options.baseDelayMs
        });
        this.written.push(event);
      } catch (err) {
        this.failed++;
        this.log.error({ err, eventType: event.type }, "dropping transcript entry");
        return;
      }
      try {
        await this.store.publish(runKeys.notify(this.runId), NEW_DATA);
      } catch (err) {
        this.log.warn({ err: errorMessage(err) }, "failed to publish new-data notification");
      }
    });
  }

  idle(): Promise<void> {
    return this.tail;
  }

  /** Entries this writer managed to persist, in order. */
  get entries(): readonly ResponseEvent[] {
    return this.written;
  }

  get failures(): number {
    return this.failed;
  }
}

export interface TranscriptPage {
  events: ResponseEvent[];
  /** Raw index to continue from, counting skipped entries too. */
  nextIndex: number;
}

/** Reads transcript entries from `start` on, skipping entries that fail validation. */
export async function readTranscript(
  store: CoordinationStore,
  runId: string,
  log: Logger,
  start = 0
): Promise<TranscriptPage> {
  const rows = await store.range(runKeys.transcript(runId), start, -1);
  const out: ResponseEvent[] = [];
  for (const row of rows) {
    const event = parseJson(row, isResponseEvent);
    if (event) {
      out.push(event);
    } else {
      log.warn({ runId }, "skipping invalid transcript entry");
    }
  }
  return { events: out, nextIndex: start + rows.length };
}
