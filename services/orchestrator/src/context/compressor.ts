/**
 * Context compression
 *
 * Bounds a conversation to a model's prompt budget without touching persisted
 * records: every stage works on presentation copies.
 *
 * Stages, each skipped once the estimated total fits the budget:
 * 1. strip raw tool-call arguments from tool results (always)
 * 2. per role (tool results, user, assistant): keep the newest message, replace
 *    older oversized ones with a head summary that names the message id
 * 3. repeat stage 2 from scratch with the per-message threshold halved
 * 4. drop whole batches from the middle of the conversation down to a floor
 * 5. cap the message count by keeping equal head and tail slices
 */
import type { ContentBlock, Message } from "../types";
import { contentText, messageTokens, totalTokens, type TokenEstimator } from "./tokens";

export const DEFAULT_TOKEN_THRESHOLD = 4096;
export const DEFAULT_MAX_ROUNDS = 5;
export const DEFAULT_REMOVAL_BATCH = 10;
export const DEFAULT_MIN_MESSAGES = 10;
export const DEFAULT_MAX_MESSAGES = 320;
export const SAFE_TRUNCATE_MAX_CHARS = 100_000;
const SAFE_TRUNCATE_RESERVE = 150;

export const TRUNCATED_MARKER = "... (truncated)";
export const MIDDLE_MARKER = "\n\n... (middle truncated) ...\n\n";
export const RESTATE_NOTE = "\n\nThis message is too long, repeat relevant information in your response to remember it";

export interface CompressOptions {
  /** Prompt budget in estimated tokens. */
  budget: number;
  estimate: TokenEstimator;
  tokenThreshold?: number;
  maxRounds?: number;
  removalBatchSize?: number;
  /** Fewest non-system messages the omission stage leaves behind. */
  minMessages?: number;
  maxMessages?: number;
}

export interface CompressionReport {
  messages: Message[];
  tokensBefore: number;
  tokensAfter: number;
  /** Role-compression passes run; 0 when the stripped input already fit. */
  rounds: number;
  omitted: number;
}

type RoleGroup = "tool" | "user" | "assistant";
const ROLE_ORDER: readonly RoleGroup[] = ["tool", "user", "assistant"];

export function isToolResultMessage(message: Message): boolean {
  if (message.role === "tool" || message.metadata.toolResult === true) return true;
  return Array.isArray(message.content) && message.content.some((block) => block.type === "tool_result");
}

function roleGroupOf(message: Message): RoleGroup | null {
  if (isToolResultMessage(message)) return "tool";
  if (message.role === "user") return "user";
  if (message.role === "assistant") return "assistant";
  return null;
}

function stripBlock(block: ContentBlock): ContentBlock {
  if (block.type !== "tool_result" || block.arguments === undefined) return block;
  const { arguments: _dropped, ...rest } = block;
  return { ...rest, argumentsOmitted: true };
}

/** Drops raw call arguments from tool-result blocks; the toolCallId stays as the reference. */
export function stripToolMetadata(message: Message): Message {
  if (!Array.isArray(message.content) || !isToolResultMessage(message)) return message;
  if (!message.content.some((b) => b.type === "tool_result" && b.arguments !== undefined)) return message;
  return { ...message, content: message.content.map(stripBlock) };
}

// text replacements lose the tool-result blocks, so the copy keeps its role group in metadata
function toolResultFlag(message: Message): { toolResult?: true } {
  return isToolResultMessage(message) ? { toolResult: true } : {};
}

export function summarize(message: Message, maxChars: number): Message {
  const text = contentText(message);
  if (text.length <= maxChars) return message;
  const summary = `${text.slice(0, maxChars)}${TRUNCATED_MARKER}\n\nmessage_id "${message.id}"\nUse expand-message tool to see contents`;
  return {
    ...message,
    kind: "text",
    content: summary,
    metadata: { ...message.metadata, ...toolResultFlag(message), compressed: true }
  };
}

/** Keeps the head and tail of an oversized message around a middle marker. */
export function safeTruncate(message: Message, maxChars: number): Message {
  const ceiling = Math.min(maxChars, SAFE_TRUNCATE_MAX_CHARS);
  const text = contentText(message);
  if (text.length <= ceiling) return message;
  const keep = Math.max(0, ceiling - SAFE_TRUNCATE_RESERVE);
  const head = Math.floor(keep / 2);
  const tail = keep - head;
  const content = `${text.slice(0, head)}${MIDDLE_MARKER}${tail > 0 ? text.slice(-tail) : ""}${RESTATE_NOTE}`;
  return {
    ...message,
    kind: "text",
    content,
    metadata: { ...message.metadata, ...toolResultFlag(message), truncated: true }
  };
}

function compressRole(
  messages: Message[],
  group: RoleGroup,
  threshold: number,
  budget: number,
  estimate: TokenEstimator
): Message[] {
  const out = messages.slice();
  let seen = 0;
  for (let i = out.length - 1; i >= 0; i--) {
    const message = out[i];
    if (roleGroupOf(message) !== group) continue;
    seen++;
    if (seen === 1) {
      out[i] = safeTruncate(message, budget * 2);
      continue;
    }
    if (message.metadata.compressed === true) continue;
    if (messageTokens(message, estimate) > threshold) {
      out[i] = summarize(message, threshold * 3);
    }
  }
  return out;
}

function compressByRole(messages: Message[], threshold: number, budget: number, estimate: TokenEstimator): Message[] {
  let result = messages;
  for (const group of ROLE_ORDER) {
    if (totalTokens(result, estimate) <= budget) break;
    result = compressRole(result, group, threshold, budget, estimate);
  }
  return result;
}

export function omitMiddle(
  messages: Message[],
  budget: number,
  estimate: TokenEstimator,
  batchSize: number = DEFAULT_REMOVAL_BATCH,
  minMessages: number = DEFAULT_MIN_MESSAGES
): Message[] {
  if (messages.length === 0) return messages;
  const system = messages[0].role === "system" ? messages[0] : undefined;
  let conversation = system ? messages.slice(1) : messages.slice();
  const assemble = () => (system ? [system, ...conversation] : conversation);

  let tokens = totalTokens(assemble(), estimate);
  let safety = 500;
  while (tokens > budget && safety > 0) {
    safety--;
    const take = Math.min(batchSize, conversation.length - minMessages, Math.floor(conversation.length / 2));
    if (take <= 0) break;
    if (conversation.length > batchSize * 2) {
      const start = Math.floor(conversation.length / 2) - Math.floor(take / 2);
      conversation = [...conversation.slice(0, start), ...conversation.slice(start + take)];
    } else {
      conversation = conversation.slice(take);
    }
    tokens = totalTokens(assemble(), estimate);
  }
  return assemble();
}

export function capMessageCount(messages: Message[], maxMessages: number = DEFAULT_MAX_MESSAGES): Message[] {
  if (messages.length <= maxMessages) return messages;
  const keepStart = Math.floor(maxMessages / 2);
  const keepEnd = maxMessages - keepStart;
  return [...messages.slice(0, keepStart), ...messages.slice(messages.length - keepEnd)];
}

export function compressWithReport(messages: readonly Message[], options: CompressOptions): CompressionReport {
  const { budget, estimate } = options;
  const threshold = options.tokenThreshold ?? DEFAULT_TOKEN_THRESHOLD;
  const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;

  const stripped = messages.map(stripToolMetadata);
  const tokensBefore = totalTokens(stripped, estimate);

  let result = stripped;
  let rounds = 0;
  let tokens = tokensBefore;
  while (tokens > budget && rounds < maxRounds) {
    const roundThreshold = Math.max(1, Math.floor(threshold / 2 ** rounds));
    result = compressByRole(stripped, roundThreshold, budget, estimate);
    tokens = totalTokens(result, estimate);
    rounds++;
  }

  let omitted = 0;
  if (tokens > budget) {
    const kept = omitMiddle(result, budget, estimate, options.removalBatchSize, options.minMessages);
    omitted = result.length - kept.length;
    result = kept;
  }

  const capped = capMessageCount(result, options.maxMessages);
  omitted += result.length - capped.length;

  return {
    messages: capped,
    tokensBefore,
    tokensAfter: totalTokens(capped, estimate),
    rounds,
    omitted
  };
}

export function compressMessages(messages: readonly Message[], options: CompressOptions): Message[] {
  return compressWithReport(messages, options).messages;
}
