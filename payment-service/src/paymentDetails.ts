import { z } from "zod";
import type { PaymentDetails, PaymentMetadata } from "./types";

const DROPPED_KEYS = new Set(["cvv", "cvc", "securityCode"]);

const storedDetailsSchema = z.record(z.string());

export const DEFAULT_LEADING_DIGITS = 4;

/** Keeps `leadingDigits` (at least four) and the last four digits; at least one digit stays hidden. */
export function maskCardNumber(cardNumber: string, leadingDigits = DEFAULT_LEADING_DIGITS): string {
  const digits = cardNumber.replace(/[\s-]/g, "");
  if (digits.length <= 8) return digits;
  const leading = Math.min(Math.max(leadingDigits, DEFAULT_LEADING_DIGITS), digits.length - 5);
  return digits.slice(0, leading) + "*".repeat(digits.length - leading - 4) + digits.slice(-4);
}

/** Copy of the details that is safe to persist: card number masked, security codes dropped. */
export function maskPaymentDetails(details: PaymentDetails, leadingDigits = DEFAULT_LEADING_DIGITS): PaymentDetails {
  const masked: PaymentDetails = {};
  for (const [key, value] of Object.entries(details)) {
    if (DROPPED_KEYS.has(key)) continue;
    masked[key] = key === "cardNumber" ? maskCardNumber(value, leadingDigits) : value;
  }
  return masked;
}

export function storedPaymentDetails(metadata: PaymentMetadata): PaymentDetails {
  const parsed = storedDetailsSchema.safeParse(metadata.paymentDetails);
  return parsed.success ? parsed.data : {};
}
