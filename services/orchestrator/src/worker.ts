import type { RunCoordinator, ExecutionOutcome } from "./coordination/coordinator";
import type { CoordinationStore } from "./coordination/store";
import { InvalidPayloadError } from "./errors";
import { moduleLogger, type Logger } from "./observability/logger";
import { isRunInvocation, validateInvocation } from "./validation/schemas";

export const HEALTH_CHECK_TTL_SECONDS = 60;

/**
 * Entry points a job queue consumer calls. Payloads arrive untrusted and are
 * validated before anything touches the store.
 */
export class RunWorker {
  private readonly log: Logger;

  constructor(
    private readonly coordinator: RunCoordinator,
    private readonly store: CoordinationStore,
    logger?: Logger
  ) {
    this.log = logger ?? moduleLogger("worker");
  }

  async handle(payload: unknown): Promise<ExecutionOutcome> {
    if (!isRunInvocation(payload)) {
      const { errors } = validateInvocation(payload);
      this.log.warn({ errors }, "rejecting invalid run invocation");
      throw new InvalidPayloadError("run invocation", errors ?? []);
    }
    return this.coordinator.execute(payload);
  }

  /** Liveness probe job: proves the worker can reach the shared store. */
  async checkHealth(key: string): Promise<void> {
    this.log.debug({ key }, "running health check");
    await this.store.set(key, "healthy", HEALTH_CHECK_TTL_SECONDS);
  }
}
