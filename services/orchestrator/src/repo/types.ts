import type { ResponseEvent, Run, TerminalRunStatus } from "../types";

export interface RunCompletion {
  status: TerminalRunStatus;
  completedAt: string;
  error?: string;
  transcript?: ResponseEvent[];
}

/** "already-terminal" means the update was ignored: terminal runs never change. */
export type CompletionResult = "updated" | "already-terminal" | "not-found";

/**
 * Source-of-truth store for runs.
 */
export interface RunRepository {
  createRun(run: Run): Promise<void>;
  getRun(runId: string): Promise<Run | null>;
  completeRun(runId: string, completion: RunCompletion): Promise<CompletionResult>;
}

export function applyCompletion(run: Run, completion: RunCompletion): Run {
  return {
    ...run,
    status: completion.status,
    completedAt: completion.completedAt,
    error: completion.error ?? run.error,
    transcript: completion.transcript ?? run.transcript
  };
}
