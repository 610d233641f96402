import { getEncoding, type Tiktoken } from "js-tiktoken";
import type { Message } from "../types";
import { moduleLogger } from "../observability/logger";
import type { TokenEncoding } from "./models";

const log = moduleLogger("tokens");
const FALLBACK_CHARS_PER_TOKEN = 4;

export type TokenEstimator = (text: string) => number;

const encoders = new Map<Exclude<TokenEncoding, "chars">, Tiktoken>();

export function charEstimate(text: string): number {
  if (text.length === 0) return 0;
  return Math.ceil(text.length / FALLBACK_CHARS_PER_TOKEN);
}

export function estimatorFor(encoding: TokenEncoding): TokenEstimator {
  if (encoding === "chars") return charEstimate;

  return function countWithEncoding(text: string): number {
    if (text.length === 0) return 0;
    try {
      let encoder = encoders.get(encoding);
      if (!encoder) {
        encoder = getEncoding(encoding);
        encoders.set(encoding, encoder);
      }
      return encoder.encode(text).length;
    } catch (err) {
      log.warn({ err, encoding }, "token encoding failed, falling back to char estimate");
      return charEstimate(text);
    }
  };
}

/** Text the model actually sees for a message; block content is serialized as JSON. */
export function contentText(message: Pick<Message, "content">): string {
  return typeof message.content === "string" ? message.content : JSON.stringify(message.content);
}

export function messageTokens(message: Message, estimate: TokenEstimator): number {
  return estimate(contentText(message));
}

export function totalTokens(messages: readonly Message[], estimate: TokenEstimator): number {
  return messages.reduce((sum, message) => sum + messageTokens(message, estimate), 0);
}
