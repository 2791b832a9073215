import { v4 as uuidv4 } from "uuid";
import { trace } from "@opentelemetry/api";
import { z } from "zod";
import { ConcurrentModificationError, DependencyFailureError, fail, ok } from "./errors";
import type { Result } from "./errors";
import { errorMessage, logger } from "./logger";
import type { LogContext } from "./logger";
import type { PaymentGateway } from "./gateway";
import type { PaymentEventPublisher } from "./kafka";
import type { PurchaseNotifier } from "./notifications/purchaseNotifier";
import { transitionOrderStatus } from "./orderStatus";
import { DEFAULT_LEADING_DIGITS, maskPaymentDetails, storedPaymentDetails } from "./paymentDetails";
import { canTransition, transitionError } from "./paymentState";
import { attempt, bestEffort, required, runRequired } from "./sideEffects";
import type { PaymentRepository, Store } from "./store";
import { PAYMENT_METHODS } from "./types";
import type {
  OrderStatusChange,
  Payment,
  PaymentDetails,
  PaymentEventType,
  PaymentPatch,
  PaymentResponse,
  PaymentView,
  StepOutcome,
} from "./types";

export const GATEWAY_DECLINE_MESSAGE = "Payment declined by gateway";

/** Largest value the `amount_cents` INTEGER column holds. */
export const MAX_AMOUNT_CENTS = 2_147_483_647;

export const processPaymentRequestSchema = z.object({
  orderId: z.string().min(1),
  userId: z.string().min(1),
  paymentMethod: z.enum(PAYMENT_METHODS),
  amountCents: z.number().int().positive().max(MAX_AMOUNT_CENTS),
  paymentDetails: z.record(z.string()).default({}),
});

export type ProcessPaymentRequest = z.input<typeof processPaymentRequestSchema>;

export interface PaymentOrchestratorDeps {
  store: Store;
  gateway: PaymentGateway;
  notifier: PurchaseNotifier;
  events: PaymentEventPublisher;
  now?: () => Date;
  newTransactionId?: () => string;
  /**
   * Leading card digits kept when details are stored. Must cover the gateway's
   * blocked prefix so a retry with the stored details is declined the same way.
   */
  cardPrefixDigits?: number;
}

export function toPaymentView(payment: Payment): PaymentView {
  return {
    id: payment.id,
    transactionId: payment.transactionId,
    orderId: payment.orderId,
    userId: payment.userId,
    paymentMethod: payment.paymentMethod,
    status: payment.status,
    amountCents: payment.amountCents,
    errorMessage: payment.errorMessage,
    retryCount: payment.retryCount,
    metadata: payment.metadata,
    createdAt: payment.createdAt.toISOString(),
    updatedAt: payment.updatedAt.toISOString(),
    completedAt: payment.completedAt ? payment.completedAt.toISOString() : null,
  };
}

function logContext(payment: Payment, traceId?: string): LogContext {
  return {
    traceId,
    paymentId: payment.id,
    transactionId: payment.transactionId,
    orderId: payment.orderId,
    userId: payment.userId,
  };
}

/**
 * Owns the payment state machine and sequences what happens around settlement.
 *
 * Payment completion, order delivery and the library grant commit together;
 * everything after the commit (cart, notifications, events) is best effort.
 */
export class PaymentOrchestrator {
  private readonly store: Store;
  private readonly gateway: PaymentGateway;
  private readonly notifier: PurchaseNotifier;
  private readonly events: PaymentEventPublisher;
  private readonly now: () => Date;
  private readonly newTransactionId: () => string;
  private readonly cardPrefixDigits: number;

  constructor(deps: PaymentOrchestratorDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.notifier = deps.notifier;
    this.events = deps.events;
    this.now = deps.now ?? (() => new Date());
    this.newTransactionId = deps.newTransactionId ?? (() => `TXN-${uuidv4()}`);
    this.cardPrefixDigits = deps.cardPrefixDigits ?? DEFAULT_LEADING_DIGITS;
  }

  async processPayment(input: unknown, traceId?: string): Promise<Result<PaymentResponse>> {
    const parsed = processPaymentRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
      logger.warn("Rejected invalid payment request", { traceId, issues });
      return fail("VALIDATION_ERROR", "Invalid payment request", issues);
    }
    const request = parsed.data;
    logger.info("Processing payment", {
      traceId,
      orderId: request.orderId,
      userId: request.userId,
      paymentMethod: request.paymentMethod,
    });

    const order = await this.store.orders.findById(request.orderId);
    if (!order) {
      return fail("NOT_FOUND", `Order ${request.orderId} not found`);
    }

    let payment: Payment;
    try {
      payment = await this.store.payments.insert({
        id: uuidv4(),
        transactionId: this.newTransactionId(),
        orderId: request.orderId,
        userId: request.userId,
        paymentMethod: request.paymentMethod,
        amountCents: request.amountCents,
        metadata: { paymentDetails: maskPaymentDetails(request.paymentDetails, this.cardPrefixDigits) },
      });
    } catch (err) {
      logger.error("Could not create payment record", { traceId, orderId: request.orderId, error: errorMessage(err) });
      return ok(errorResponse(null, err, null));
    }

    return ok(await this.settle(payment, request.paymentDetails, traceId));
  }

  async retryPayment(paymentId: string, traceId?: string): Promise<Result<PaymentResponse>> {
    const payment = await this.store.payments.findById(paymentId);
    if (!payment) return fail("NOT_FOUND", `Payment ${paymentId} not found`);
    if (!canTransition(payment.status, "PROCESSING")) {
      return fail("INVALID_STATE_TRANSITION", transitionError(payment.status, "PROCESSING"));
    }

    const reset = await this.store.payments.update(payment, {
      status: "PROCESSING",
      retryCount: payment.retryCount + 1,
      errorMessage: null,
    });
    if (!reset) {
      return fail("INVALID_STATE_TRANSITION", `Payment ${paymentId} was modified concurrently; retry not applied`);
    }
    const context = logContext(reset, traceId);
    logger.info("Retrying payment", { ...context, retryCount: reset.retryCount });
    const retried = await this.publish("payment_retried", reset, context);

    const response = await this.settle(reset, storedPaymentDetails(reset.metadata), traceId);
    return ok({ ...response, sideEffects: [retried, ...response.sideEffects] });
  }

  async refundPayment(paymentId: string, traceId?: string): Promise<Result<PaymentResponse>> {
    const payment = await this.store.payments.findById(paymentId);
    if (!payment) return fail("NOT_FOUND", `Payment ${paymentId} not found`);
    if (!canTransition(payment.status, "REFUNDED")) {
      return fail("INVALID_STATE_TRANSITION", transitionError(payment.status, "REFUNDED"));
    }

    const context = logContext(payment, traceId);
    const sideEffects: StepOutcome[] = [];
    let refunded: Payment;
    try {
      refunded = await this.store.transaction(async (uow) => {
        const updated = await this.advance(uow.payments, payment, { status: "REFUNDED" });
        await transitionOrderStatus(uow, payment.orderId, "CANCELLED", (change) =>
          this.announceOrderChange(change, sideEffects, context)
        );
        return updated;
      });
    } catch (err) {
      if (err instanceof ConcurrentModificationError) {
        return fail("INVALID_STATE_TRANSITION", `Payment ${paymentId} was modified concurrently; refund not applied`);
      }
      throw err;
    }
    logger.info("Payment refunded", context);

    sideEffects.push(
      await attempt(
        bestEffort("notify.refund", () => this.notifier.notifyRefund(refunded)),
        context
      )
    );
    sideEffects.push(await this.publish("payment_refunded", refunded, context));

    return ok({
      success: true,
      transactionId: refunded.transactionId,
      status: "REFUNDED",
      message: "Payment refunded successfully",
      payment: toPaymentView(refunded),
      sideEffects,
    });
  }

  async getPaymentById(paymentId: string): Promise<Result<PaymentView>> {
    const payment = await this.store.payments.findById(paymentId);
    return payment ? ok(toPaymentView(payment)) : fail("NOT_FOUND", `Payment ${paymentId} not found`);
  }

  async getPaymentByTransactionId(transactionId: string): Promise<Result<PaymentView>> {
    const payment = await this.store.payments.findByTransactionId(transactionId);
    return payment
      ? ok(toPaymentView(payment))
      : fail("NOT_FOUND", `Payment with transaction ${transactionId} not found`);
  }

  async getPaymentsByUserId(userId: string): Promise<PaymentView[]> {
    const payments = await this.store.payments.findByUserId(userId);
    return payments.map(toPaymentView);
  }

  async getPaymentsByOrderId(orderId: string): Promise<PaymentView[]> {
    const payments = await this.store.payments.findByOrderId(orderId);
    return payments.map(toPaymentView);
  }

  private async settle(payment: Payment, paymentDetails: PaymentDetails, traceId?: string): Promise<PaymentResponse> {
    const context = logContext(payment, traceId);
    const span = trace.getActiveSpan();
    if (span) {
      span.setAttribute("payment.transaction_id", payment.transactionId);
      span.setAttribute("order.id", payment.orderId);
    }

    try {
      const outcome = await this.gateway.settle({
        transactionId: payment.transactionId,
        orderId: payment.orderId,
        paymentMethod: payment.paymentMethod,
        amountCents: payment.amountCents,
        paymentDetails,
      });
      if (outcome.approved) {
        return await this.completeSettlement(payment, context);
      }
      logger.warn("Payment declined", { ...context, reason: outcome.reason });
      return await this.declineSettlement(payment, context);
    } catch (err) {
      logger.error("Error processing payment", { ...context, error: errorMessage(err) });
      const latest = await this.markFailed(payment.id, errorMessage(err), context);
      return errorResponse(payment.transactionId, err, latest);
    }
  }

  private async completeSettlement(payment: Payment, context: LogContext): Promise<PaymentResponse> {
    const sideEffects: StepOutcome[] = [];

    const { completed, order } = await this.store.transaction(async (uow) => {
      const completed = await this.advance(uow.payments, payment, {
        status: "COMPLETED",
        completedAt: this.now(),
      });
      const change = await transitionOrderStatus(uow, payment.orderId, "DELIVERED", (c) =>
        this.announceOrderChange(c, sideEffects, context)
      );
      if (!change) {
        throw new DependencyFailureError("Library grant", new Error(`Order ${payment.orderId} not found`));
      }
      await runRequired(required("Library grant", () => uow.library.grantOrder(change.order, completed.id)));
      return { completed, order: change.order };
    });
    logger.info("Payment completed and order delivered", context);

    sideEffects.push(
      await attempt(
        bestEffort("cart.clear", () => this.store.carts.clear(payment.userId)),
        context
      )
    );

    const fresh = (await this.store.payments.findById(payment.id)) ?? completed;

    sideEffects.push(
      await attempt(
        bestEffort("notify.purchase", () => this.notifier.notifySuccessfulPurchase(order, fresh)),
        context
      )
    );
    sideEffects.push(await this.publish("payment_completed", fresh, context));

    return {
      success: true,
      transactionId: fresh.transactionId,
      status: "COMPLETED",
      message: "Payment processed successfully",
      payment: toPaymentView(fresh),
      sideEffects,
    };
  }

  private async declineSettlement(payment: Payment, context: LogContext): Promise<PaymentResponse> {
    const failed = await this.advance(this.store.payments, payment, {
      status: "FAILED",
      errorMessage: GATEWAY_DECLINE_MESSAGE,
    });

    const sideEffects: StepOutcome[] = [];
    sideEffects.push(
      await attempt(
        bestEffort("notify.paymentFailed", async () => {
          const order = await this.store.orders.findById(payment.orderId);
          if (!order) throw new Error(`Order ${payment.orderId} not found`);
          return this.notifier.notifyFailedPayment(order, GATEWAY_DECLINE_MESSAGE);
        }),
        context
      )
    );
    sideEffects.push(await this.publish("payment_failed", failed, context));

    return {
      success: false,
      transactionId: failed.transactionId,
      status: "FAILED",
      message: "Payment was declined. Please try again or use a different payment method.",
      payment: toPaymentView(failed),
      sideEffects,
    };
  }

  private async advance(payments: PaymentRepository, current: Payment, patch: PaymentPatch): Promise<Payment> {
    if (!canTransition(current.status, patch.status)) {
      throw new Error(transitionError(current.status, patch.status));
    }
    const updated = await payments.update(current, patch);
    if (!updated) throw new ConcurrentModificationError(current.id);
    return updated;
  }

  private async announceOrderChange(
    change: OrderStatusChange,
    sideEffects: StepOutcome[],
    context: LogContext
  ): Promise<void> {
    sideEffects.push(
      await attempt(
        bestEffort("notify.orderStatus", () =>
          this.notifier.notifyOrderStatusChange(change.order, change.previousStatus, change.newStatus)
        ),
        context
      )
    );
  }

  /** Moves a still-PROCESSING payment to FAILED after an unexpected error; returns the latest known record. */
  private async markFailed(paymentId: string, reason: string, context: LogContext): Promise<Payment | null> {
    try {
      const latest = await this.store.payments.findById(paymentId);
      if (!latest || latest.status !== "PROCESSING") return latest;
      const failed = await this.store.payments.update(latest, { status: "FAILED", errorMessage: reason });
      return failed ?? (await this.store.payments.findById(paymentId));
    } catch (err) {
      logger.error("Could not record payment failure", { ...context, error: errorMessage(err) });
      return null;
    }
  }

  private publish(type: PaymentEventType, payment: Payment, context: LogContext): Promise<StepOutcome> {
    return attempt(
      bestEffort(`event.${type}`, () =>
        this.events.publish(
          {
            type,
            paymentId: payment.id,
            transactionId: payment.transactionId,
            orderId: payment.orderId,
            userId: payment.userId,
            amountCents: payment.amountCents,
            status: payment.status,
            retryCount: payment.retryCount,
            errorMessage: payment.errorMessage,
          },
          context.traceId
        )
      ),
      context
    );
  }
}

function errorResponse(transactionId: string | null, err: unknown, latest: Payment | null): PaymentResponse {
  return {
    success: false,
    transactionId,
    status: "FAILED",
    message: `An error occurred while processing your payment: ${errorMessage(err)}`,
    payment: latest ? toPaymentView(latest) : null,
    sideEffects: [],
  };
}
