import { logger } from "./logger";
import type { UnitOfWork } from "./store";
import type { OrderStatus, OrderStatusChange } from "./types";

/**
 * The only path through which payments change an order's status. The change is
 * persisted inside `uow` and `onChange` is registered to fire once that unit
 * commits, so every committed change is announced exactly once.
 */
export async function transitionOrderStatus(
  uow: UnitOfWork,
  orderId: string,
  status: OrderStatus,
  onChange: (change: OrderStatusChange) => Promise<unknown>
): Promise<OrderStatusChange | null> {
  const order = await uow.orders.findById(orderId);
  if (!order) {
    logger.warn("Order not found for status change", { orderId, status });
    return null;
  }
  const previousStatus = order.status;
  await uow.orders.updateStatus(orderId, status);
  const change: OrderStatusChange = { order: { ...order, status }, previousStatus, newStatus: status };
  uow.afterCommit("order.statusChanged", () => onChange(change));
  return change;
}
