import { WatchError, createClient } from "redis";
import type { Run } from "../types";
import { isTerminalStatus } from "../types";
import { moduleLogger } from "../observability/logger";
import { isRun, parseJson } from "../validation/schemas";
import { applyCompletion, type CompletionResult, type RunCompletion, type RunRepository } from "./types";

type RedisClient = ReturnType<typeof createClient>;

const log = moduleLogger("redis-repo");
const MAX_WATCH_ATTEMPTS = 5;

/**
 * Redis-backed run repository using node-redis v4.
 * Lazy-connects on first use.
 */
export default class RedisRunRepository implements RunRepository {
  private client: RedisClient | null = null;

  constructor(private readonly url: string = process.env.REDIS_URL ?? "") {}

  private async clientReady(): Promise<RedisClient> {
    if (this.client && this.client.isOpen) return this.client;
    const client = createClient({ url: this.url });
    client.on("error", (err: unknown) => {
      log.error({ err }, "redis client error");
    });
    await client.connect();
    this.client = client;
    return client;
  }

  private runKey(runId: string) {
    return `run:${runId}`;
  }

  async createRun(run: Run): Promise<void> {
    const client = await this.clientReady();
    await client.set(this.runKey(run.id), JSON.stringify(run));
  }

  async getRun(runId: string): Promise<Run | null> {
    const client = await this.clientReady();
    const raw = await client.get(this.runKey(runId));
    if (!raw) return null;
    const run = parseJson(raw, isRun);
    if (!run) {
      log.warn({ runId }, "stored run record is invalid, treating as missing");
    }
    return run;
  }

  async completeRun(runId: string, completion: RunCompletion): Promise<CompletionResult> {
    const client = await this.clientReady();
    const key = this.runKey(runId);
    for (let attempt = 1; ; attempt++) {
      try {
        return await client.executeIsolated(async (isolated): Promise<CompletionResult> => {
          await isolated.watch(key);
          const raw = await isolated.get(key);
          const run = raw ? parseJson(raw, isRun) : null;
          if (!run || isTerminalStatus(run.status)) {
            await isolated.unwatch();
            return run ? "already-terminal" : "not-found";
          }
          // exec fails with WatchError if another writer touched the key since WATCH
          await isolated.multi().set(key, JSON.stringify(applyCompletion(run, completion))).exec();
          return "updated";
        });
      } catch (err) {
        if (!(err instanceof WatchError) || attempt >= MAX_WATCH_ATTEMPTS) throw err;
        log.debug({ runId, attempt }, "run record changed during completion, retrying");
      }
    }
  }

  async close(): Promise<void> {
    if (this.client?.isOpen) await this.client.quit();
    this.client = null;
  }
}
