import type { PaymentStatus } from "./types";

const ALLOWED: Record<PaymentStatus, readonly PaymentStatus[]> = {
  PROCESSING: ["COMPLETED", "FAILED"],
  FAILED: ["PROCESSING"],
  COMPLETED: ["REFUNDED"],
  REFUNDED: [],
};

export function canTransition(from: PaymentStatus, to: PaymentStatus): boolean {
  return ALLOWED[from].includes(to);
}

export function transitionError(from: PaymentStatus, to: PaymentStatus): string {
  if (to === "PROCESSING") return "Only failed payments can be retried";
  if (to === "REFUNDED") return "Only completed payments can be refunded";
  return `Cannot move payment from ${from} to ${to}`;
}
