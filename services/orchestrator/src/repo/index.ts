import MemoryRunRepository from "./memoryRepo";
import RedisRunRepository from "./redisRepo";
import type { RunRepository } from "./types";

/**
 * Returns the Redis-backed repo when a Redis URL is given,
 * otherwise falls back to the in-memory implementation.
 */
export function createRepository(redisUrl: string = process.env.REDIS_URL ?? ""): RunRepository {
  if (redisUrl.trim() !== "") {
    return new RedisRunRepository(redisUrl);
  }
  return new MemoryRunRepository();
}

export { MemoryRunRepository, RedisRunRepository };
export { applyCompletion } from "./types";
export type { CompletionResult, RunCompletion, RunRepository } from "./types";
