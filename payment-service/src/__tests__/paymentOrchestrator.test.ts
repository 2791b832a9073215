import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Result } from "../errors";
import { GatewaySimulator } from "../gateway";
import { GATEWAY_DECLINE_MESSAGE, MAX_AMOUNT_CENTS, PaymentOrchestrator } from "../paymentOrchestrator";
import type { Order, PaymentResponse } from "../types";
import { FakeGateway, RecordingEvents, RecordingNotifier } from "./helpers/fakes";
import { MemoryStore } from "./helpers/memoryStore";

const NOW = new Date("2024-02-01T10:00:00Z");
const DECLINED_MESSAGE = "Payment was declined. Please try again or use a different payment method.";

const order: Order = {
  id: "order-1",
  userId: "user-1",
  orderNumber: "ORD-1001",
  status: "PENDING",
  totalAmountCents: 2598,
  items: [
    { itemId: "song-1", itemType: "SONG", priceCents: 99, quantity: 1 },
    { itemId: "album-1", itemType: "ALBUM", priceCents: 2499, quantity: 1 },
  ],
};

const request = {
  orderId: "order-1",
  userId: "user-1",
  paymentMethod: "CREDIT_CARD",
  amountCents: 2598,
  paymentDetails: { cardNumber: "5555444433331111", cardHolder: "Test Holder", cvv: "123" },
};

const testCardRequest = {
  ...request,
  paymentDetails: { cardNumber: "4000123412341234", cvv: "123" },
};

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  return result.value;
}

function paymentIdOf(response: PaymentResponse): string {
  if (!response.payment) throw new Error("response carries no payment");
  return response.payment.id;
}

describe("PaymentOrchestrator", () => {
  let store: MemoryStore;
  let gateway: FakeGateway;
  let notifier: RecordingNotifier;
  let events: RecordingEvents;
  let orchestrator: PaymentOrchestrator;

  beforeEach(() => {
    store = new MemoryStore();
    store.addOrder(order);
    store.setCart("user-1", ["song-1", "album-1"]);
    gateway = new FakeGateway();
    notifier = new RecordingNotifier();
    events = new RecordingEvents();
    let counter = 0;
    orchestrator = new PaymentOrchestrator({
      store,
      gateway,
      notifier,
      events,
      now: () => NOW,
      newTransactionId: () => `TXN-test-${++counter}`,
    });
  });

  describe("processPayment", () => {
    it("completes the payment, delivers the order and grants the library", async () => {
      const response = unwrap(await orchestrator.processPayment(request, "trace-1"));
      const paymentId = paymentIdOf(response);

      expect(response).toMatchObject({
        success: true,
        transactionId: "TXN-test-1",
        status: "COMPLETED",
        message: "Payment processed successfully",
      });
      expect(response.payment).toMatchObject({
        status: "COMPLETED",
        retryCount: 0,
        errorMessage: null,
        completedAt: "2024-02-01T10:00:00.000Z",
        metadata: { paymentDetails: { cardNumber: "5555********1111", cardHolder: "Test Holder" } },
      });
      expect(response.sideEffects).toEqual([
        { step: "notify.orderStatus", ok: true },
        { step: "cart.clear", ok: true },
        { step: "notify.purchase", ok: true },
        { step: "event.payment_completed", ok: true },
      ]);

      expect(store.state.orders.get("order-1")?.status).toBe("DELIVERED");
      expect(store.state.library).toEqual([
        { userId: "user-1", itemId: "song-1", itemType: "SONG", orderId: "order-1", paymentId },
        { userId: "user-1", itemId: "album-1", itemType: "ALBUM", orderId: "order-1", paymentId },
      ]);
      expect(store.state.carts.get("user-1")).toEqual([]);
      expect(notifier.calls).toEqual([
        { kind: "orderStatus", orderId: "order-1", previousStatus: "PENDING", newStatus: "DELIVERED" },
        { kind: "purchase", orderId: "order-1", paymentStatus: "COMPLETED" },
      ]);
      expect(events.published.map((e) => e.type)).toEqual(["payment_completed"]);
    });

    it("hands the unmasked card details to the gateway", async () => {
      await orchestrator.processPayment(request);

      expect(gateway.requests).toEqual([
        {
          transactionId: "TXN-test-1",
          orderId: "order-1",
          paymentMethod: "CREDIT_CARD",
          amountCents: 2598,
          paymentDetails: { cardNumber: "5555444433331111", cardHolder: "Test Holder", cvv: "123" },
        },
      ]);
    });

    it("declines the test card and leaves the order untouched", async () => {
      const simulated = new PaymentOrchestrator({
        store,
        gateway: new GatewaySimulator(
          { minDelayMs: 1000, maxDelayMs: 3000, successRate: 0.9, blockedCardPrefix: "4000" },
          () => 0,
          async () => undefined
        ),
        notifier,
        events,
      });

      const response = unwrap(await simulated.processPayment(testCardRequest));

      expect(response.success).toBe(false);
      expect(response.status).toBe("FAILED");
      expect(response.message).toBe(DECLINED_MESSAGE);
      expect(response.payment).toMatchObject({
        status: "FAILED",
        errorMessage: GATEWAY_DECLINE_MESSAGE,
        metadata: { paymentDetails: { cardNumber: "4000********1234" } },
      });
      expect(response.sideEffects).toEqual([
        { step: "notify.paymentFailed", ok: true },
        { step: "event.payment_failed", ok: true },
      ]);
      expect(store.state.orders.get("order-1")?.status).toBe("PENDING");
      expect(store.state.library).toEqual([]);
      expect(store.state.carts.get("user-1")).toEqual(["song-1", "album-1"]);
      expect(notifier.calls).toEqual([{ kind: "failed", orderId: "order-1", reason: GATEWAY_DECLINE_MESSAGE }]);
    });

    it("rejects a request that fails validation", async () => {
      const result = await orchestrator.processPayment(null);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "VALIDATION_ERROR",
          message: "Invalid payment request",
          issues: ["body: Expected object, received null"],
        },
      });
    });

    it("names each invalid field", async () => {
      const result = await orchestrator.processPayment({ ...request, userId: "", amountCents: -5 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.issues?.map((issue) => issue.split(":")[0])).toEqual(["userId", "amountCents"]);
    });

    it("rejects an amount the amount column cannot hold", async () => {
      const result = await orchestrator.processPayment({ ...request, amountCents: MAX_AMOUNT_CENTS + 1 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("VALIDATION_ERROR");
      expect(result.error.issues?.map((issue) => issue.split(":")[0])).toEqual(["amountCents"]);
      expect(store.state.payments.size).toBe(0);
    });

    it("accepts the largest storable amount", async () => {
      const response = unwrap(await orchestrator.processPayment({ ...request, amountCents: MAX_AMOUNT_CENTS }));
      expect(response.payment?.amountCents).toBe(MAX_AMOUNT_CENTS);
    });

    it("returns NOT_FOUND for an unknown order without creating a payment", async () => {
      const result = await orchestrator.processPayment({ ...request, orderId: "order-404" });

      expect(result).toEqual({ ok: false, error: { kind: "NOT_FOUND", message: "Order order-404 not found" } });
      expect(store.state.payments.size).toBe(0);
      expect(gateway.requests).toEqual([]);
    });

    it("rolls everything back when the library grant fails", async () => {
      store.failLibraryGrant = new Error("library unavailable");

      const response = unwrap(await orchestrator.processPayment(request));

      expect(response).toMatchObject({
        success: false,
        transactionId: "TXN-test-1",
        status: "FAILED",
        message: "An error occurred while processing your payment: Library grant failed: library unavailable",
        sideEffects: [],
      });
      expect(response.payment).toMatchObject({
        status: "FAILED",
        errorMessage: "Library grant failed: library unavailable",
        completedAt: null,
      });
      expect(store.state.orders.get("order-1")?.status).toBe("PENDING");
      expect(store.state.library).toEqual([]);
      expect(store.state.carts.get("user-1")).toEqual(["song-1", "album-1"]);
      expect(notifier.calls).toEqual([]);
      expect(events.published).toEqual([]);
    });

    it("keeps the purchase when cart, notification and event steps fail", async () => {
      store.failCartClear = new Error("cart down");
      notifier.failing.add("purchase");
      events.failure = new Error("broker down");

      const response = unwrap(await orchestrator.processPayment(request));

      expect(response.success).toBe(true);
      expect(response.status).toBe("COMPLETED");
      expect(response.sideEffects).toEqual([
        { step: "notify.orderStatus", ok: true },
        { step: "cart.clear", ok: false, error: "cart down" },
        { step: "notify.purchase", ok: false, error: "purchase push down" },
        { step: "event.payment_completed", ok: false, error: "broker down" },
      ]);
      expect(store.state.orders.get("order-1")?.status).toBe("DELIVERED");
      expect(store.state.library).toHaveLength(2);
    });

    it("records an undelivered notification", async () => {
      notifier.delivered = false;

      const response = unwrap(await orchestrator.processPayment(request));

      expect(response.sideEffects[0]).toEqual({ step: "notify.orderStatus", ok: false, error: "not delivered" });
      expect(response.success).toBe(true);
    });

    it("reports a failure when the payment record cannot be created", async () => {
      vi.spyOn(store.payments, "insert").mockRejectedValue(new Error("db down"));

      const response = unwrap(await orchestrator.processPayment(request));

      expect(response).toEqual({
        success: false,
        transactionId: null,
        status: "FAILED",
        message: "An error occurred while processing your payment: db down",
        payment: null,
        sideEffects: [],
      });
    });
  });

  describe("retryPayment", () => {
    it("resets a failed payment and settles it again", async () => {
      gateway.declineAll();
      const declined = unwrap(await orchestrator.processPayment(request));
      const paymentId = paymentIdOf(declined);

      const seenAtSettlement: Array<{ status: string; errorMessage: string | null; retryCount: number }> = [];
      gateway.decide = async (req) => {
        const current = await store.payments.findByTransactionId(req.transactionId);
        if (current) {
          seenAtSettlement.push({
            status: current.status,
            errorMessage: current.errorMessage,
            retryCount: current.retryCount,
          });
        }
        return { approved: true, latencyMs: 0 };
      };

      const response = unwrap(await orchestrator.retryPayment(paymentId));

      expect(seenAtSettlement).toEqual([{ status: "PROCESSING", errorMessage: null, retryCount: 1 }]);
      expect(response).toMatchObject({ success: true, status: "COMPLETED", transactionId: "TXN-test-1" });
      expect(response.payment).toMatchObject({ id: paymentId, retryCount: 1, errorMessage: null });
      expect(response.sideEffects.map((s) => s.step)).toEqual([
        "event.payment_retried",
        "notify.orderStatus",
        "cart.clear",
        "notify.purchase",
        "event.payment_completed",
      ]);
      expect(store.state.payments.size).toBe(1);
      expect(store.state.orders.get("order-1")?.status).toBe("DELIVERED");
    });

    it("settles a retry with the stored masked details", async () => {
      gateway.declineAll();
      const declined = unwrap(await orchestrator.processPayment(request));

      await orchestrator.retryPayment(paymentIdOf(declined));

      expect(gateway.requests[1]?.paymentDetails).toEqual({
        cardNumber: "5555********1111",
        cardHolder: "Test Holder",
      });
    });

    it("declines the test card again on retry", async () => {
      const simulated = new PaymentOrchestrator({
        store,
        gateway: new GatewaySimulator(
          { minDelayMs: 1000, maxDelayMs: 3000, successRate: 0.9, blockedCardPrefix: "4000" },
          () => 0,
          async () => undefined
        ),
        notifier,
        events,
      });
      const first = unwrap(await simulated.processPayment(testCardRequest));

      const response = unwrap(await simulated.retryPayment(paymentIdOf(first)));

      expect(response.success).toBe(false);
      expect(response.message).toBe(DECLINED_MESSAGE);
      expect(response.payment).toMatchObject({ retryCount: 1, errorMessage: GATEWAY_DECLINE_MESSAGE });
      expect(response.sideEffects).toEqual([
        { step: "event.payment_retried", ok: true },
        { step: "notify.paymentFailed", ok: true },
        { step: "event.payment_failed", ok: true },
      ]);
      expect(events.published.map((e) => [e.type, e.status, e.retryCount])).toEqual([
        ["payment_failed", "FAILED", 0],
        ["payment_retried", "PROCESSING", 1],
        ["payment_failed", "FAILED", 1],
      ]);
    });

    it("declines again on retry when the blocked prefix is longer than four digits", async () => {
      const blockedCardPrefix = "400012";
      const simulated = new PaymentOrchestrator({
        store,
        gateway: new GatewaySimulator(
          { minDelayMs: 1000, maxDelayMs: 3000, successRate: 0.9, blockedCardPrefix },
          () => 0,
          async () => undefined
        ),
        notifier,
        events,
        cardPrefixDigits: blockedCardPrefix.length,
      });
      const first = unwrap(await simulated.processPayment(testCardRequest));

      const response = unwrap(await simulated.retryPayment(paymentIdOf(first)));

      expect(first.status).toBe("FAILED");
      expect(response.status).toBe("FAILED");
      expect(response.message).toBe(DECLINED_MESSAGE);
      expect(response.payment?.metadata).toEqual({ paymentDetails: { cardNumber: "400012******1234" } });
    });

    it("refuses to retry a payment that did not fail", async () => {
      const completed = unwrap(await orchestrator.processPayment(request));

      const result = await orchestrator.retryPayment(paymentIdOf(completed));

      expect(result).toEqual({
        ok: false,
        error: { kind: "INVALID_STATE_TRANSITION", message: "Only failed payments can be retried" },
      });
    });

    it("returns NOT_FOUND for an unknown payment", async () => {
      expect(await orchestrator.retryPayment("missing")).toEqual({
        ok: false,
        error: { kind: "NOT_FOUND", message: "Payment missing not found" },
      });
    });

    it("applies only one of two concurrent retries", async () => {
      gateway.declineAll();
      const declined = unwrap(await orchestrator.processPayment(request));
      const paymentId = paymentIdOf(declined);
      gateway.approveAll();

      const results = await Promise.all([orchestrator.retryPayment(paymentId), orchestrator.retryPayment(paymentId)]);

      const applied = results.filter((r) => r.ok);
      const rejected = results.filter((r) => !r.ok);
      expect(applied).toHaveLength(1);
      expect(rejected).toEqual([
        {
          ok: false,
          error: {
            kind: "INVALID_STATE_TRANSITION",
            message: `Payment ${paymentId} was modified concurrently; retry not applied`,
          },
        },
      ]);
      expect(store.state.payments.get(paymentId)?.retryCount).toBe(1);
      expect(store.state.payments.get(paymentId)?.status).toBe("COMPLETED");
    });
  });

  describe("refundPayment", () => {
    it("refunds a completed payment and cancels the order", async () => {
      const completed = unwrap(await orchestrator.processPayment(request));
      const paymentId = paymentIdOf(completed);

      const response = unwrap(await orchestrator.refundPayment(paymentId));

      expect(response).toMatchObject({
        success: true,
        transactionId: "TXN-test-1",
        status: "REFUNDED",
        message: "Payment refunded successfully",
      });
      expect(response.payment?.status).toBe("REFUNDED");
      expect(response.sideEffects).toEqual([
        { step: "notify.orderStatus", ok: true },
        { step: "notify.refund", ok: true },
        { step: "event.payment_refunded", ok: true },
      ]);
      expect(store.state.orders.get("order-1")?.status).toBe("CANCELLED");
      expect(notifier.calls.slice(-2)).toEqual([
        { kind: "orderStatus", orderId: "order-1", previousStatus: "DELIVERED", newStatus: "CANCELLED" },
        { kind: "refund", paymentId },
      ]);
    });

    it("refuses a second refund", async () => {
      const completed = unwrap(await orchestrator.processPayment(request));
      const paymentId = paymentIdOf(completed);
      await orchestrator.refundPayment(paymentId);

      const result = await orchestrator.refundPayment(paymentId);

      expect(result).toEqual({
        ok: false,
        error: { kind: "INVALID_STATE_TRANSITION", message: "Only completed payments can be refunded" },
      });
    });

    it("refuses to refund a failed payment", async () => {
      gateway.declineAll();
      const declined = unwrap(await orchestrator.processPayment(request));

      const result = await orchestrator.refundPayment(paymentIdOf(declined));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("INVALID_STATE_TRANSITION");
    });

    it("applies only one of two concurrent refunds", async () => {
      const completed = unwrap(await orchestrator.processPayment(request));
      const paymentId = paymentIdOf(completed);

      const results = await Promise.all([orchestrator.refundPayment(paymentId), orchestrator.refundPayment(paymentId)]);

      const applied = results.flatMap((r) => (r.ok ? [r.value.status] : []));
      const rejected = results.filter((r) => !r.ok);
      expect(applied).toEqual(["REFUNDED"]);
      expect(rejected).toEqual([
        {
          ok: false,
          error: {
            kind: "INVALID_STATE_TRANSITION",
            message: `Payment ${paymentId} was modified concurrently; refund not applied`,
          },
        },
      ]);
      expect(store.state.payments.get(paymentId)?.status).toBe("REFUNDED");
      expect(store.state.orders.get("order-1")?.status).toBe("CANCELLED");
      expect(notifier.calls.filter((c) => c.kind === "refund")).toHaveLength(1);
      expect(events.published.filter((e) => e.type === "payment_refunded")).toHaveLength(1);
    });
  });

  describe("lookups", () => {
    it("finds a payment by id and by transaction id", async () => {
      const response = unwrap(await orchestrator.processPayment(request));
      const paymentId = paymentIdOf(response);

      const byId = unwrap(await orchestrator.getPaymentById(paymentId));
      const byTransaction = unwrap(await orchestrator.getPaymentByTransactionId("TXN-test-1"));

      expect(byId).toEqual(byTransaction);
      expect(byId).toEqual(response.payment);
    });

    it("reports unknown ids", async () => {
      expect(await orchestrator.getPaymentById("missing")).toEqual({
        ok: false,
        error: { kind: "NOT_FOUND", message: "Payment missing not found" },
      });
      expect(await orchestrator.getPaymentByTransactionId("TXN-none")).toEqual({
        ok: false,
        error: { kind: "NOT_FOUND", message: "Payment with transaction TXN-none not found" },
      });
    });

    it("lists payments newest first", async () => {
      store.addOrder({ ...order, id: "order-2", orderNumber: "ORD-1002", status: "PENDING" });
      const first = unwrap(await orchestrator.processPayment(request));
      const second = unwrap(await orchestrator.processPayment({ ...request, orderId: "order-2" }));

      const byUser = await orchestrator.getPaymentsByUserId("user-1");
      const byOrder = await orchestrator.getPaymentsByOrderId("order-2");

      expect(byUser.map((p) => p.id)).toEqual([paymentIdOf(second), paymentIdOf(first)]);
      expect(byOrder.map((p) => p.transactionId)).toEqual(["TXN-test-2"]);
      expect(await orchestrator.getPaymentsByUserId("user-404")).toEqual([]);
    });
  });
});
