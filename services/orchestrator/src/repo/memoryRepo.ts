import type { Run } from "../types";
import { isTerminalStatus } from "../types";
import type { CompletionResult, RunCompletion, RunRepository } from "./types";
import { applyCompletion } from "./types";

/**
 * In-memory run repository used as a fallback and in tests.
 */
export default class MemoryRunRepository implements RunRepository {
  private runs: Map<string, Run> = new Map();

  async createRun(run: Run): Promise<void> {
    this.runs.set(run.id, structuredClone(run));
  }

  async getRun(runId: string): Promise<Run | null> {
    const r = this.runs.get(runId);
    return r ? structuredClone(r) : null;
  }

  async completeRun(runId: string, completion: RunCompletion): Promise<CompletionResult> {
    const r = this.runs.get(runId);
    if (!r) return "not-found";
    if (isTerminalStatus(r.status)) return "already-terminal";
    this.runs.set(runId, applyCompletion(r, structuredClone(completion)));
    return "updated";
  }
}
