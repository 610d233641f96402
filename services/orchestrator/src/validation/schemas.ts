// Validation of JSON that crosses process boundaries: queued invocations,
// run records and transcript entries read back from the shared store.
import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import runSchema from "../../schemas/orchestrator/run.schema.json";
import eventSchema from "../../schemas/orchestrator/event.schema.json";
import invocationSchema from "../../schemas/orchestrator/invocation.schema.json";
import type { ResponseEvent, Run } from "../types";
import type { RunInvocation } from "../coordination/invocation";

const ajv = new Ajv({ strict: false, allErrors: true, allowUnionTypes: true });

const validateRunFn: ValidateFunction<Run> = ajv.compile<Run>(runSchema);
const validateEventFn: ValidateFunction<ResponseEvent> = ajv.compile<ResponseEvent>(eventSchema);
const validateInvocationFn: ValidateFunction<RunInvocation> = ajv.compile<RunInvocation>(invocationSchema);

export type ValidationResult = { valid: boolean; errors?: string[] };

function formatErrors(errors: ErrorObject[] | null | undefined): string[] | undefined {
  if (!errors || errors.length === 0) return undefined;
  return errors.map((e) => {
    const path = e.instancePath && e.instancePath.length ? e.instancePath : "(root)";
    const message = e.message ?? JSON.stringify(e);
    return `${path} ${message}`.trim();
  });
}

export function validateInvocation(data: unknown): ValidationResult {
  const valid = validateInvocationFn(data);
  return { valid, errors: valid ? undefined : formatErrors(validateInvocationFn.errors) };
}

export function isRun(data: unknown): data is Run {
  return validateRunFn(data);
}

export function isResponseEvent(data: unknown): data is ResponseEvent {
  return validateEventFn(data);
}

export function isRunInvocation(data: unknown): data is RunInvocation {
  return validateInvocationFn(data);
}

/** Parses one stored JSON entry; null when it is not valid JSON or not of the expected shape. */
export function parseJson<T>(raw: string, guard: (data: unknown) => data is T): T | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return guard(parsed) ? parsed : null;
}
