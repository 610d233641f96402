import MemoryCoordinationStore from "./memoryStore";
import RedisCoordinationStore from "./redisStore";
import type { CoordinationStore } from "./store";

/**
 * Redis-backed store when a Redis URL is given, otherwise the in-process one
 * (single-instance coordination only).
 */
export function createCoordinationStore(redisUrl: string = process.env.REDIS_URL ?? ""): CoordinationStore {
  if (redisUrl.trim() !== "") {
    return new RedisCoordinationStore(redisUrl);
  }
  return new MemoryCoordinationStore();
}

export { MemoryCoordinationStore, RedisCoordinationStore };
export { RunCoordinator, controlSignalFor } from "./coordinator";
export type { ExecutionOutcome, RunCoordinatorDeps, TurnSource } from "./coordinator";
export { followRun } from "./follower";
export type { FollowOptions } from "./follower";
export { orchestratedTurns } from "./turnSource";
export type { TurnContext } from "./turnSource";
export { runKeys } from "./keys";
export type { RunInvocation } from "./invocation";
export type { ChannelMessage, CoordinationStore, Subscription } from "./store";
