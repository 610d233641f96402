import type { Message, ResponseEvent } from "../types";
import type { TurnSettings } from "../config";
import { compressWithReport } from "../context/compressor";
import { defaultCatalog, type ModelCatalog } from "../context/models";
import { estimatorFor } from "../context/tokens";
import { OrchestratorError, OverloadRetriesExhaustedError, TransientProviderError, errorMessage } from "../errors";
import { moduleLogger, type Logger } from "../observability/logger";
import { autoContinues, compressionRounds, overloadFallbacks } from "../observability/metrics";
import type {
  LlmClient,
  MessageSource,
  ResponseEventProcessor,
  ToolChoice,
  ToolRegistryView
} from "./types";

export interface TurnOptions {
  model: string;
  temperature?: number;
  /** Defaults to the model family's output cap. */
  maxTokens?: number;
  stream?: boolean;
  toolChoice?: ToolChoice;
  /** Sent on the first sub-iteration only, never persisted. */
  ephemeralMessage?: Message;
  maxAutoContinues?: number;
  maxOverloadRetries?: number;
  signal?: AbortSignal;
}

export interface TurnOrchestratorDeps {
  messages: MessageSource;
  llm: LlmClient;
  processor: ResponseEventProcessor;
  catalog?: ModelCatalog;
  settings?: Partial<TurnSettings>;
  logger?: Logger;
}

const DEFAULT_SETTINGS: TurnSettings = { maxAutoContinues: 25, maxOverloadRetries: 3 };

export function limitReachedEvent(limit: number): ResponseEvent {
  return { type: "content", content: `\n[Agent reached maximum auto-continue limit of ${limit}]` };
}

/**
 * Places the ephemeral message right before the most recent user message, or
 * at the end when the history has no user message.
 */
export function spliceEphemeral(messages: Message[], ephemeral?: Message): Message[] {
  if (!ephemeral) return messages;
  let lastUser = -1;
  messages.forEach((m, i) => {
    if (m.role === "user") lastUser = i;
  });
  if (lastUser < 0) return [...messages, ephemeral];
  return [...messages.slice(0, lastUser), ephemeral, ...messages.slice(lastUser)];
}

function errorStatus(err: unknown): ResponseEvent {
  return {
    type: "status",
    status: "error",
    message: `Error in thread processing: ${errorMessage(err)}`,
    code: err instanceof OrchestratorError ? err.code : "turn_failed"
  };
}

/**
 * Drives one conversational exchange. A `finish` with reason "tool-calls" is
 * swallowed and the thread is run again, up to `maxAutoContinues` times; the
 * processor has already persisted the tool results by then.
 */
export class TurnOrchestrator {
  private readonly catalog: ModelCatalog;
  private readonly settings: TurnSettings;
  private readonly log: Logger;

  constructor(private readonly deps: TurnOrchestratorDeps) {
    this.catalog = deps.catalog ?? defaultCatalog;
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.log = deps.logger ?? moduleLogger("turn");
  }

  async *runTurn(
    threadId: string,
    systemPrompt: Message,
    tools: ToolRegistryView,
    options: TurnOptions
  ): AsyncGenerator<ResponseEvent, void, undefined> {
    const maxContinues = options.maxAutoContinues ?? this.settings.maxAutoContinues;
    const maxOverloadRetries = options.maxOverloadRetries ?? this.settings.maxOverloadRetries;
    const log = this.log.child({ threadId });

    let model = options.model;
    let continues = 0;
    let overloadRetries = 0;

    for (;;) {
      if (options.signal?.aborted) {
        log.info({ continues }, "turn cancelled, no further model calls");
        return;
      }

      let wantsContinue = false;
      try {
        const events = await this.runOnce(
          threadId,
          systemPrompt,
          tools,
          { ...options, model },
          continues === 0 ? options.ephemeralMessage : undefined,
          log
        );
        for await (const event of events) {
          if (event.type === "finish" && event.reason === "tool-calls" && maxContinues > 0) {
            wantsContinue = true;
            continues++;
            autoContinues.inc();
            log.info({ continues, maxContinues }, "finish_reason=tool-calls, auto-continuing");
            continue;
          }
          if (event.type === "finish" && event.reason === "tool-call-limit-reached") {
            log.info("tool call limit reached, stopping auto-continue");
          }
          yield event;
        }
      } catch (err) {
        if (options.signal?.aborted) {
          log.info({ err: errorMessage(err) }, "turn aborted while streaming");
          return;
        }
        if (err instanceof TransientProviderError) {
          if (overloadRetries >= maxOverloadRetries) {
            const exhausted = new OverloadRetriesExhaustedError(model, overloadRetries, { cause: err });
            log.error({ model, overloadRetries }, exhausted.message);
            yield errorStatus(exhausted);
            return;
          }
          overloadRetries++;
          const fallback = this.catalog.fallbackFor(model);
          overloadFallbacks.inc();
          log.warn({ model, fallback, attempt: overloadRetries }, "provider overloaded, retrying on fallback route");
          model = fallback;
          continue;
        }
        log.error({ err }, "turn failed");
        yield errorStatus(err);
        return;
      }

      if (!wantsContinue) return;
      if (continues >= maxContinues) {
        log.warn({ maxContinues }, "reached maximum auto-continue limit, stopping");
        yield limitReachedEvent(maxContinues);
        return;
      }
    }
  }

  private async runOnce(
    threadId: string,
    systemPrompt: Message,
    tools: ToolRegistryView,
    options: TurnOptions,
    ephemeral: Message | undefined,
    log: Logger
  ): Promise<AsyncIterable<ResponseEvent>> {
    const history = await this.deps.messages.listMessages(threadId);
    const prepared = spliceEphemeral([systemPrompt, ...history], ephemeral);

    const profile = this.catalog.profileOf(options.model);
    const report = compressWithReport(prepared, {
      budget: profile.contextBudget,
      estimate: estimatorFor(profile.encoding)
    });
    compressionRounds.observe(report.rounds);
    log.info(
      {
        model: options.model,
        messages: report.messages.length,
        tokensBefore: report.tokensBefore,
        tokensAfter: report.tokensAfter,
        rounds: report.rounds,
        omitted: report.omitted
      },
      "prompt prepared"
    );

    const response = await this.deps.llm.complete({
      messages: report.messages,
      tools: tools.schemas(),
      model: options.model,
      temperature: options.temperature ?? 0,
      maxTokens: options.maxTokens ?? profile.maxOutputTokens,
      stream: options.stream ?? true,
      toolChoice: options.toolChoice ?? "auto",
      signal: options.signal
    });

    return this.deps.processor.process(response, {
      threadId,
      model: options.model,
      tools,
      promptMessages: report.messages,
      signal: options.signal
    });
  }
}
