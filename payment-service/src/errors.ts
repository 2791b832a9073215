export type PaymentErrorKind = "NOT_FOUND" | "VALIDATION_ERROR" | "INVALID_STATE_TRANSITION";

export interface PaymentError {
  kind: PaymentErrorKind;
  message: string;
  issues?: string[];
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: PaymentError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: PaymentErrorKind, message: string, issues?: string[]): Result<T> {
  return { ok: false, error: issues ? { kind, message, issues } : { kind, message } };
}

export function httpStatusFor(kind: PaymentErrorKind): number {
  return kind === "NOT_FOUND" ? 404 : 400;
}

/** A required side effect failed; the purchase cannot be considered complete. */
export class DependencyFailureError extends Error {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`${step} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "DependencyFailureError";
    this.step = step;
  }
}

/** A compare-and-set write hit a stale version. */
export class ConcurrentModificationError extends Error {
  constructor(paymentId: string) {
    super(`Payment ${paymentId} was modified concurrently`);
    this.name = "ConcurrentModificationError";
  }
}
