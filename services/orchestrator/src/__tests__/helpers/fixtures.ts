import pino from "pino";
import type { CoordinatorSettings } from "../../config";
import type { Message, MessageRole, Run } from "../../types";

export const silentLogger = pino({ level: "silent" });

export function message(id: string, role: MessageRole, content: Message["content"]): Message {
  return {
    id,
    role,
    kind: typeof content === "string" ? "text" : "blocks",
    content,
    originatedFromModel: role === "assistant",
    metadata: {},
    createdAt: "2024-01-01T00:00:00.000Z"
  };
}

export function runningRun(id: string, overrides: Partial<Run> = {}): Run {
  return {
    id,
    threadId: "thread-1",
    projectId: "project-1",
    status: "running",
    startedAt: "2024-01-01T00:00:00.000Z",
    transcript: [],
    ...overrides
  };
}

export function testSettings(overrides: Partial<CoordinatorSettings> = {}): CoordinatorSettings {
  return {
    instanceId: "inst-a",
    lockTtlSeconds: 60,
    livenessTtlSeconds: 60,
    transcriptRetentionSeconds: 120,
    stopPollIntervalMs: 10,
    livenessRefreshIntervalMs: 1000,
    pendingWritesTimeoutMs: 1000,
    statusUpdateAttempts: 3,
    statusUpdateBackoffMs: 1,
    ...overrides
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}
