/**
 * Payload the job queue delivers to a worker for one run.
 * Queue retries redeliver the same payload; the run lock turns repeats into no-ops.
 */
export interface RunInvocation {
  runId: string;
  threadId: string;
  projectId: string;
  model: string;
  stream?: boolean;
  temperature?: number;
  maxTokens?: number;
  maxAutoContinues?: number;
  requestId?: string;
  metadata?: Record<string, unknown>;
}
