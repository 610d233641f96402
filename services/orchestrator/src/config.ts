import { z } from "zod";
import { nanoid } from "nanoid";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/**
 * Environment-backed service settings.
 * Durations ending in _SECONDS feed store TTLs; _MS values drive in-process timers.
 */
export const EnvSchema = z.object({
  REDIS_URL: z.string().trim().default(""),
  INSTANCE_ID: z.string().trim().min(1).optional(),
  PORT: positiveInt(7070),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  ORCHESTRATOR_API_KEY: z.string().trim().default(""),
  CORS_ORIGINS: z.string().trim().default(""),
  RUN_LOCK_TTL_SECONDS: positiveInt(86_400),
  LIVENESS_TTL_SECONDS: positiveInt(86_400),
  TRANSCRIPT_RETENTION_SECONDS: positiveInt(86_400),
  STOP_POLL_INTERVAL_MS: positiveInt(500),
  LIVENESS_REFRESH_INTERVAL_MS: positiveInt(30_000),
  PENDING_WRITES_TIMEOUT_MS: positiveInt(30_000),
  STATUS_UPDATE_ATTEMPTS: positiveInt(3),
  STATUS_UPDATE_BACKOFF_MS: positiveInt(500),
  MAX_AUTO_CONTINUES: z.coerce.number().int().min(0).default(25),
  MAX_OVERLOAD_RETRIES: z.coerce.number().int().min(0).default(3)
});

export type Env = z.infer<typeof EnvSchema>;

export interface CoordinatorSettings {
  instanceId: string;
  lockTtlSeconds: number;
  livenessTtlSeconds: number;
  transcriptRetentionSeconds: number;
  stopPollIntervalMs: number;
  livenessRefreshIntervalMs: number;
  pendingWritesTimeoutMs: number;
  statusUpdateAttempts: number;
  statusUpdateBackoffMs: number;
}

export interface TurnSettings {
  maxAutoContinues: number;
  maxOverloadRetries: number;
}

export interface ServiceConfig {
  redisUrl: string;
  port: number;
  logLevel: Env["LOG_LEVEL"];
  apiKey: string;
  corsOrigins: string[];
  coordinator: CoordinatorSettings;
  turn: TurnSettings;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const env = EnvSchema.parse(source);
  return {
    redisUrl: env.REDIS_URL,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    apiKey: env.ORCHESTRATOR_API_KEY,
    corsOrigins: env.CORS_ORIGINS.split(",")
      .map((s) => s.trim())
      .filter((s) => s !== ""),
    coordinator: {
      instanceId: env.INSTANCE_ID ?? nanoid(8),
      lockTtlSeconds: env.RUN_LOCK_TTL_SECONDS,
      livenessTtlSeconds: env.LIVENESS_TTL_SECONDS,
      transcriptRetentionSeconds: env.TRANSCRIPT_RETENTION_SECONDS,
      stopPollIntervalMs: env.STOP_POLL_INTERVAL_MS,
      livenessRefreshIntervalMs: env.LIVENESS_REFRESH_INTERVAL_MS,
      pendingWritesTimeoutMs: env.PENDING_WRITES_TIMEOUT_MS,
      statusUpdateAttempts: env.STATUS_UPDATE_ATTEMPTS,
      statusUpdateBackoffMs: env.STATUS_UPDATE_BACKOFF_MS
    },
    turn: {
      maxAutoContinues: env.MAX_AUTO_CONTINUES,
      maxOverloadRetries: env.MAX_OVERLOAD_RETRIES
    }
  };
}
