import { validate as isUuid } from "uuid";
import type { Query } from "./client";
import type { PaymentRepository } from "../store";
import type { NewPayment, Payment, PaymentMetadata, PaymentMethod, PaymentPatch, PaymentStatus } from "../types";

// Row types are aliases so they satisfy pg's QueryResultRow index signature.
export type PaymentRow = {
  id: string;
  transaction_id: string;
  order_id: string;
  user_id: string;
  payment_method: PaymentMethod;
  status: PaymentStatus;
  amount_cents: number;
  error_message: string | null;
  retry_count: number;
  metadata: PaymentMetadata;
  version: number;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
};

const COLUMNS =
  "id, transaction_id, order_id, user_id, payment_method, status, amount_cents, error_message, retry_count, metadata, version, created_at, updated_at, completed_at";

function rowToPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    orderId: row.order_id,
    userId: row.user_id,
    paymentMethod: row.payment_method,
    status: row.status,
    amountCents: row.amount_cents,
    errorMessage: row.error_message,
    retryCount: row.retry_count,
    metadata: row.metadata,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
  };
}

export function createPaymentRepository(query: Query): PaymentRepository {
  return {
    async insert(payment: NewPayment): Promise<Payment> {
      const result = await query<PaymentRow>(
        `INSERT INTO payments (id, transaction_id, order_id, user_id, payment_method, status, amount_cents, retry_count, metadata, version, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, 'PROCESSING', $6, 0, $7, 0, NOW(), NOW())
         RETURNING ${COLUMNS}`,
        [
          payment.id,
          payment.transactionId,
          payment.orderId,
          payment.userId,
          payment.paymentMethod,
          payment.amountCents,
          JSON.stringify(payment.metadata),
        ]
      );
      return rowToPayment(result.rows[0]);
    },

    async findById(id: string): Promise<Payment | null> {
      // payments.id is a UUID column; PostgreSQL rejects any other literal
      if (!isUuid(id)) return null;
      const result = await query<PaymentRow>(`SELECT ${COLUMNS} FROM payments WHERE id = $1`, [id]);
      return result.rows[0] ? rowToPayment(result.rows[0]) : null;
    },

    async findByTransactionId(transactionId: string): Promise<Payment | null> {
      const result = await query<PaymentRow>(`SELECT ${COLUMNS} FROM payments WHERE transaction_id = $1`, [
        transactionId,
      ]);
      return result.rows[0] ? rowToPayment(result.rows[0]) : null;
    },

    async findByUserId(userId: string): Promise<Payment[]> {
      const result = await query<PaymentRow>(
        `SELECT ${COLUMNS} FROM payments WHERE user_id = $1 ORDER BY created_at DESC`,
        [userId]
      );
      return result.rows.map(rowToPayment);
    },

    async findByOrderId(orderId: string): Promise<Payment[]> {
      const result = await query<PaymentRow>(
        `SELECT ${COLUMNS} FROM payments WHERE order_id = $1 ORDER BY created_at DESC`,
        [orderId]
      );
      return result.rows.map(rowToPayment);
    },

    async update(current: Payment, patch: PaymentPatch): Promise<Payment | null> {
      const next = {
        errorMessage: patch.errorMessage !== undefined ? patch.errorMessage : current.errorMessage,
        retryCount: patch.retryCount !== undefined ? patch.retryCount : current.retryCount,
        completedAt: patch.completedAt !== undefined ? patch.completedAt : current.completedAt,
      };
      const result = await query<PaymentRow>(
        `UPDATE payments
         SET status = $3, error_message = $4, retry_count = $5, completed_at = $6, version = version + 1, updated_at = NOW()
         WHERE id = $1 AND version = $2
         RETURNING ${COLUMNS}`,
        [current.id, current.version, patch.status, next.errorMessage, next.retryCount, next.completedAt]
      );
      return result.rows[0] ? rowToPayment(result.rows[0]) : null;
    },
  };
}
