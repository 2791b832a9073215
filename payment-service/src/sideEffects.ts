import { DependencyFailureError } from "./errors";
import { errorMessage, logger } from "./logger";
import type { LogContext } from "./logger";
import type { StepOutcome } from "./types";

/** A step the purchase cannot complete without; failure aborts the unit of work. */
export interface RequiredStep<T> {
  kind: "required";
  name: string;
  run: () => Promise<T>;
}

/**
 * A step whose failure is logged and recorded but never aborts or reverses the flow.
 * A run that resolves to `false` counts as "attempted, nothing delivered".
 */
export interface BestEffortStep {
  kind: "best-effort";
  name: string;
  run: () => Promise<unknown>;
}

export function required<T>(name: string, run: () => Promise<T>): RequiredStep<T> {
  return { kind: "required", name, run };
}

export function bestEffort(name: string, run: () => Promise<unknown>): BestEffortStep {
  return { kind: "best-effort", name, run };
}

export async function runRequired<T>(step: RequiredStep<T>): Promise<T> {
  try {
    return await step.run();
  } catch (err) {
    throw new DependencyFailureError(step.name, err);
  }
}

export async function attempt(step: BestEffortStep, context: LogContext): Promise<StepOutcome> {
  try {
    const result = await step.run();
    if (result === false) {
      logger.warn("Best-effort step delivered nothing", { ...context, step: step.name });
      return { step: step.name, ok: false, error: "not delivered" };
    }
    return { step: step.name, ok: true };
  } catch (err) {
    const error = errorMessage(err);
    logger.error("Best-effort step failed", { ...context, step: step.name, error });
    return { step: step.name, ok: false, error };
  }
}
