import type { Message, ResponseEvent } from "../types";
import type { TurnOrchestrator } from "../turn/orchestrator";
import type { ToolRegistryView } from "../turn/types";
import type { TurnSource } from "./coordinator";
import type { RunInvocation } from "./invocation";

/** Per-run inputs the orchestrator needs besides the thread history. */
export interface TurnContext {
  systemPrompt(invocation: RunInvocation): Message | Promise<Message>;
  tools(invocation: RunInvocation): ToolRegistryView;
  ephemeralMessage?(invocation: RunInvocation): Message | undefined | Promise<Message | undefined>;
}

export function orchestratedTurns(orchestrator: TurnOrchestrator, context: TurnContext): TurnSource {
  return async function* (invocation: RunInvocation, signal: AbortSignal): AsyncGenerator<ResponseEvent, void, undefined> {
    const systemPrompt = await context.systemPrompt(invocation);
    const ephemeralMessage = context.ephemeralMessage ? await context.ephemeralMessage(invocation) : undefined;
    yield* orchestrator.runTurn(invocation.threadId, systemPrompt, context.tools(invocation), {
      model: invocation.model,
      stream: invocation.stream,
      temperature: invocation.temperature,
      maxTokens: invocation.maxTokens,
      maxAutoContinues: invocation.maxAutoContinues,
      ephemeralMessage,
      signal
    });
  };
}
