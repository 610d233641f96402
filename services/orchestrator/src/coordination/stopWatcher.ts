import type { Logger } from "../observability/logger";
import { errorMessage } from "../errors";
import type { CoordinationStore, Subscription } from "./store";

export interface StopWatcherOptions {
  subscription: Subscription;
  store: CoordinationStore;
  livenessKey: string;
  livenessTtlSeconds: number;
  pollIntervalMs: number;
  refreshIntervalMs: number;
  logger: Logger;
}

/**
 * Periodic task running beside a run: watches the control channels for STOP
 * and keeps the instance liveness key from expiring. Cancellation is
 * cooperative; the executor checks `stopRequested` at event boundaries and
 * hands `signal` to the turn.
 */
export class StopWatcher {
  private readonly controller = new AbortController();
  private halted = false;
  private loop: Promise<void> | null = null;

  constructor(private readonly options: StopWatcherOptions) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  private async run(): Promise<void> {
    const { subscription, store, livenessKey, logger: log } = this.options;
    let lastRefresh = Date.now();
    try {
      while (!this.halted && !this.stopRequested) {
        const msg = await subscription.next(this.options.pollIntervalMs);
        if (msg && msg.message === "STOP") {
          log.info({ channel: msg.channel }, "received STOP signal");
          this.controller.abort();
          break;
        }
        if (Date.now() - lastRefresh >= this.options.refreshIntervalMs) {
          lastRefresh = Date.now();
          try {
            await store.expire(livenessKey, this.options.livenessTtlSeconds);
          } catch (err) {
            log.warn({ key: livenessKey, err: errorMessage(err) }, "failed to refresh liveness TTL");
          }
        }
      }
    } catch (err) {
      log.error({ err }, "stop watcher failed, stopping run");
      this.controller.abort();
    }
  }

  /** Ends the watch loop; resolves within one poll interval. */
  async halt(): Promise<void> {
    this.halted = true;
    if (this.loop) await this.loop;
  }
}
