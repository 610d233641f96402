/**
 * Error taxonomy shared by the turn orchestrator and the run coordinator.
 * Every error carries a stable `code` that ends up on status events.
 */
export class OrchestratorError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Provider reported it is overloaded; retried against a fallback route. */
export class TransientProviderError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider_overloaded", message, options);
  }
}

export class RateLimitError extends OrchestratorError {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super("rate_limited", message);
    this.retryAfterMs = retryAfterMs;
  }
}

export class OverloadRetriesExhaustedError extends OrchestratorError {
  readonly attempts: number;

  constructor(model: string, attempts: number, options?: { cause?: unknown }) {
    super("overload_retries_exhausted", `Provider stayed overloaded for ${model} after ${attempts} fallback attempts`, options);
    this.attempts = attempts;
  }
}

/** Another instance holds the run lock. Callers treat this as a no-op. */
export class LockContentionError extends OrchestratorError {
  readonly runId: string;
  readonly owner: string | null;

  constructor(runId: string, owner: string | null) {
    super(
      "lock_contention",
      owner ? `Run ${runId} is already being processed by instance ${owner}` : `Run ${runId} is already being processed`
    );
    this.runId = runId;
    this.owner = owner;
  }
}

export class DurableWriteError extends OrchestratorError {
  readonly attempts: number;

  constructor(operation: string, attempts: number, options?: { cause?: unknown }) {
    super("durable_write_failed", `${operation} failed after ${attempts} attempts`, options);
    this.attempts = attempts;
  }
}

export class InvalidPayloadError extends OrchestratorError {
  readonly details: string[];

  constructor(what: string, details: string[]) {
    super("invalid_payload", `Invalid ${what}: ${details.join("; ")}`);
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
