import type { NotificationDispatcher } from "./dispatcher";
import type { Order, OrderStatus, Payment } from "../types";

/** Buyer-facing notifications emitted by the payment lifecycle. Each returns whether any device accepted it. */
export interface PurchaseNotifier {
  notifyOrderStatusChange(order: Order, previousStatus: OrderStatus, newStatus: OrderStatus): Promise<boolean>;
  notifySuccessfulPurchase(order: Order, payment: Payment): Promise<boolean>;
  notifyFailedPayment(order: Order, reason: string): Promise<boolean>;
  notifyRefund(payment: Payment): Promise<boolean>;
}

const STATUS_LABELS: Record<OrderStatus, string> = {
  PENDING: "pending",
  PROCESSING: "being processed",
  SHIPPED: "shipped",
  DELIVERED: "delivered",
  CANCELLED: "cancelled",
};

export function formatAmount(amountCents: number): string {
  return `$${(amountCents / 100).toFixed(2)}`;
}

export class PushPurchaseNotifier implements PurchaseNotifier {
  constructor(private readonly dispatcher: NotificationDispatcher) {}

  notifyOrderStatusChange(order: Order, previousStatus: OrderStatus, newStatus: OrderStatus): Promise<boolean> {
    return this.dispatcher.sendToSingleUser(order.userId, {
      title: "Order updated",
      body: `Order ${order.orderNumber} is now ${STATUS_LABELS[newStatus]} (was ${STATUS_LABELS[previousStatus]}).`,
      type: "ORDER_STATUS_CHANGED",
      referenceId: order.id,
      referenceType: "ORDER",
    });
  }

  notifySuccessfulPurchase(order: Order, payment: Payment): Promise<boolean> {
    const itemCount = order.items.reduce((sum, item) => sum + item.quantity, 0);
    return this.dispatcher.sendToSingleUser(order.userId, {
      title: "Purchase successful",
      body: `Payment of ${formatAmount(payment.amountCents)} for order ${order.orderNumber} completed. ${itemCount} item(s) added to your library.`,
      type: "PURCHASE_SUCCESS",
      referenceId: order.id,
      referenceType: "ORDER",
    });
  }

  notifyFailedPayment(order: Order, reason: string): Promise<boolean> {
    return this.dispatcher.sendToSingleUser(order.userId, {
      title: "Payment failed",
      body: `Payment for order ${order.orderNumber} failed: ${reason}`,
      type: "PAYMENT_FAILED",
      referenceId: order.id,
      referenceType: "ORDER",
    });
  }

  notifyRefund(payment: Payment): Promise<boolean> {
    return this.dispatcher.sendToSingleUser(payment.userId, {
      title: "Payment refunded",
      body: `A refund of ${formatAmount(payment.amountCents)} for transaction ${payment.transactionId} has been issued.`,
      type: "PAYMENT_REFUNDED",
      referenceId: payment.id,
      referenceType: "PAYMENT",
    });
  }
}
