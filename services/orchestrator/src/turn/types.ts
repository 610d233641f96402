import type { Message, ResponseEvent } from "../types";

export interface ToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export type ToolChoice = "auto" | "required" | "none";

export interface LlmRequest {
  messages: Message[];
  tools: ToolSchema[];
  model: string;
  temperature: number;
  maxTokens?: number;
  stream: boolean;
  toolChoice: ToolChoice;
  signal?: AbortSignal;
}

/** Incremental piece of a streamed completion. */
export interface LlmDelta {
  content?: string;
  toolCalls?: Array<{ index: number; id?: string; name?: string; arguments?: string }>;
  finishReason?: string;
}

export interface LlmResult {
  content: string;
  toolCalls: Array<{ id: string; name: string; arguments: unknown }>;
  finishReason: string;
}

export type LlmResponse = AsyncIterable<LlmDelta> | LlmResult;

/**
 * Provider client. Implementations throw TransientProviderError when the
 * provider reports overload and RateLimitError when throttled, from the call
 * itself or while the stream is being read.
 */
export interface LlmClient {
  complete(request: LlmRequest): Promise<LlmResponse>;
}

export interface ProcessContext {
  threadId: string;
  model: string;
  tools: ToolRegistryView;
  promptMessages: Message[];
  signal?: AbortSignal;
}

/**
 * Turns raw model output into response events, running requested tools and
 * persisting the resulting messages. It decides turn completion by emitting a
 * `finish` event.
 */
export interface ResponseEventProcessor {
  process(response: LlmResponse, context: ProcessContext): AsyncIterable<ResponseEvent>;
}

export interface ToolRegistryView {
  schemas(): ToolSchema[];
  has(name: string): boolean;
  invoke(name: string, args: unknown): Promise<unknown>;
}

/** Ordered LLM-visible history of a thread. */
export interface MessageSource {
  listMessages(threadId: string): Promise<Message[]>;
}
