import type { Query } from "./client";
import type { CartRepository, LibraryRepository, OrderRepository } from "../store";
import type { ItemType, Order, OrderStatus } from "../types";

type OrderRow = {
  id: string;
  user_id: string;
  order_number: string;
  status: OrderStatus;
  total_amount_cents: number;
};

type OrderItemRow = {
  item_id: string;
  item_type: ItemType;
  price_cents: number;
  quantity: number;
};

export function createOrderRepository(query: Query): OrderRepository {
  return {
    async findById(id: string): Promise<Order | null> {
      const result = await query<OrderRow>(
        "SELECT id, user_id, order_number, status, total_amount_cents FROM orders WHERE id = $1",
        [id]
      );
      const row = result.rows[0];
      if (!row) return null;
      const items = await query<OrderItemRow>(
        "SELECT item_id, item_type, price_cents, quantity FROM order_items WHERE order_id = $1 ORDER BY id",
        [id]
      );
      return {
        id: row.id,
        userId: row.user_id,
        orderNumber: row.order_number,
        status: row.status,
        totalAmountCents: row.total_amount_cents,
        items: items.rows.map((item) => ({
          itemId: item.item_id,
          itemType: item.item_type,
          priceCents: item.price_cents,
          quantity: item.quantity,
        })),
      };
    },

    async updateStatus(id: string, status: OrderStatus): Promise<void> {
      await query("UPDATE orders SET status = $2, updated_at = NOW() WHERE id = $1", [id, status]);
    },
  };
}

export function createLibraryRepository(query: Query): LibraryRepository {
  return {
    async grantOrder(order: Order, paymentId: string): Promise<number> {
      let added = 0;
      for (const item of order.items) {
        const result = await query(
          `INSERT INTO library_items (user_id, item_id, item_type, order_id, payment_id, purchased_at)
           VALUES ($1, $2, $3, $4, $5, NOW())
           ON CONFLICT (user_id, item_type, item_id) DO NOTHING`,
          [order.userId, item.itemId, item.itemType, order.id, paymentId]
        );
        added += result.rowCount ?? 0;
      }
      return added;
    },
  };
}

export function createCartRepository(query: Query): CartRepository {
  return {
    async clear(userId: string): Promise<void> {
      await query("DELETE FROM cart_items WHERE user_id = $1", [userId]);
    },
  };
}
