export type MessageRole = "system" | "user" | "assistant" | "tool";
export type MessageKind = "text" | "blocks";

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ImageBlock {
  type: "image";
  url: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  toolCallId: string;
  toolName: string;
  arguments: unknown;
}

/**
 * Result of a tool execution. `arguments` echoes the raw call arguments and is
 * dropped from presentation copies; `argumentsOmitted` marks that it was.
 */
export interface ToolResultBlock {
  type: "tool_result";
  toolCallId: string;
  toolName: string;
  output: string;
  isError?: boolean;
  arguments?: unknown;
  argumentsOmitted?: boolean;
}

export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export interface Message {
  id: string;
  role: MessageRole;
  kind: MessageKind;
  content: string | ContentBlock[];
  originatedFromModel: boolean;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export type RunStatus = "running" | "completed" | "failed" | "stopped";
export type TerminalRunStatus = Exclude<RunStatus, "running">;

export interface Run {
  id: string;
  threadId: string;
  projectId: string;
  status: RunStatus;
  startedAt: string;
  completedAt?: string;
  error?: string;
  transcript: ResponseEvent[];
}

export type FinishReason = "stop" | "tool-calls" | "tool-call-limit-reached";

/** Status values the orchestrator and coordinator put on the transcript. */
export type EventStatus = "running" | "completed" | "failed" | "stopped" | "error";

export type ResponseEvent =
  | { type: "content"; content: string; messageId?: string }
  | { type: "tool_call"; toolCallId: string; toolName: string; arguments: unknown }
  | { type: "tool_result"; toolCallId: string; toolName: string; output: string; isError?: boolean }
  | { type: "status"; status: EventStatus; message?: string; code?: string; metadata?: Record<string, unknown> }
  | { type: "finish"; reason: FinishReason };

export type ControlSignal = "STOP" | "END_STREAM" | "ERROR";

export function isTerminalStatus(status: RunStatus): status is TerminalRunStatus {
  return status !== "running";
}
