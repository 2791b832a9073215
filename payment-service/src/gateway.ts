import { logger } from "./logger";
import type { GatewayConfig } from "./config";
import type { PaymentDetails, PaymentMethod } from "./types";

export interface SettlementRequest {
  transactionId: string;
  orderId: string;
  paymentMethod: PaymentMethod;
  amountCents: number;
  paymentDetails: PaymentDetails;
}

export type DeclineReason = "TEST_CARD_DECLINED" | "GATEWAY_DECLINED";

export type SettlementOutcome =
  | { approved: true; latencyMs: number }
  | { approved: false; reason: DeclineReason; latencyMs: number };

export interface PaymentGateway {
  settle(request: SettlementRequest): Promise<SettlementOutcome>;
}

/** Returns a float in [0, 1). */
export type RandomSource = () => number;
export type Sleeper = (ms: number) => Promise<void>;

export const realSleep: Sleeper = (ms) => new Promise((r) => setTimeout(r, ms));

export class GatewaySimulator implements PaymentGateway {
  constructor(
    private readonly settings: GatewayConfig,
    private readonly random: RandomSource = Math.random,
    private readonly sleep: Sleeper = realSleep
  ) {}

  async settle(request: SettlementRequest): Promise<SettlementOutcome> {
    const { minDelayMs, maxDelayMs, successRate, blockedCardPrefix } = this.settings;
    const latencyMs = minDelayMs + Math.floor(this.random() * Math.max(0, maxDelayMs - minDelayMs));
    await this.sleep(latencyMs);

    const cardNumber = request.paymentDetails.cardNumber;
    if (cardNumber !== undefined && cardNumber.startsWith(blockedCardPrefix)) {
      logger.info("Simulated decline for test card", {
        transactionId: request.transactionId,
        orderId: request.orderId,
        latencyMs,
      });
      return { approved: false, reason: "TEST_CARD_DECLINED", latencyMs };
    }

    if (Math.floor(this.random() * 100) < Math.round(successRate * 100)) {
      return { approved: true, latencyMs };
    }
    logger.info("Simulated gateway decline", {
      transactionId: request.transactionId,
      orderId: request.orderId,
      latencyMs,
    });
    return { approved: false, reason: "GATEWAY_DECLINED", latencyMs };
  }
}
