export * from "./types";
export * from "./errors";
export { loadConfig, EnvSchema } from "./config";
export type { CoordinatorSettings, Env, ServiceConfig, TurnSettings } from "./config";
export { logger, moduleLogger } from "./observability/logger";
export type { Logger } from "./observability/logger";
export { register } from "./observability/metrics";

export {
  compressMessages,
  compressWithReport,
  DEFAULT_MAX_MESSAGES,
  DEFAULT_MAX_ROUNDS,
  DEFAULT_MIN_MESSAGES,
  DEFAULT_REMOVAL_BATCH,
  DEFAULT_TOKEN_THRESHOLD
} from "./context/compressor";
export type { CompressOptions, CompressionReport } from "./context/compressor";
export { FAMILY_PROFILES, ModelCatalog, ModelFamily, defaultCatalog } from "./context/models";
export type { FamilyProfile, TokenEncoding } from "./context/models";
export { charEstimate, estimatorFor } from "./context/tokens";
export type { TokenEstimator } from "./context/tokens";

export { TurnOrchestrator, limitReachedEvent } from "./turn/orchestrator";
export type { TurnOptions, TurnOrchestratorDeps } from "./turn/orchestrator";
export { ToolRegistry } from "./turn/toolRegistry";
export type { ToolDefinition, ToolHandler } from "./turn/toolRegistry";
export type * from "./turn/types";

export * from "./coordination";
export { createRepository, MemoryRunRepository, RedisRunRepository } from "./repo";
export type { CompletionResult, RunCompletion, RunRepository } from "./repo";
export { RunWorker } from "./worker";
export { createApp } from "./server";
export type { AppDeps } from "./server";
