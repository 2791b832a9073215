import { errorMessage, logger } from "./logger";
import type {
  DeviceToken,
  NewPayment,
  Order,
  OrderStatus,
  Payment,
  PaymentPatch,
} from "./types";

export interface PaymentRepository {
  insert(payment: NewPayment): Promise<Payment>;
  findById(id: string): Promise<Payment | null>;
  findByTransactionId(transactionId: string): Promise<Payment | null>;
  findByUserId(userId: string): Promise<Payment[]>;
  findByOrderId(orderId: string): Promise<Payment[]>;
  /**
   * Applies `patch` only if the stored row still carries `current.version`.
   * Returns the updated row, or null when another writer got there first.
   */
  update(current: Payment, patch: PaymentPatch): Promise<Payment | null>;
}

export interface OrderRepository {
  findById(id: string): Promise<Order | null>;
  updateStatus(id: string, status: OrderStatus): Promise<void>;
}

export interface LibraryRepository {
  /** Adds every item of the order to the buyer's library; already owned items are skipped. */
  grantOrder(order: Order, paymentId: string): Promise<number>;
}

export interface CartRepository {
  clear(userId: string): Promise<void>;
}

export interface TokenRegistry {
  findByUserId(userId: string): Promise<DeviceToken[]>;
  register(userId: string, token: string, platform?: string | null): Promise<DeviceToken>;
  /** Returns the number of rows removed; deleting a missing token is not an error. */
  deleteByToken(token: string): Promise<number>;
}

export type AfterCommitHook = () => Promise<unknown>;

export interface UnitOfWork {
  payments: PaymentRepository;
  orders: OrderRepository;
  library: LibraryRepository;
  /** Runs once the surrounding transaction has committed; never on rollback. */
  afterCommit(name: string, hook: AfterCommitHook): void;
}

export interface Store {
  payments: PaymentRepository;
  orders: OrderRepository;
  carts: CartRepository;
  transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}

export interface PendingHook {
  name: string;
  hook: AfterCommitHook;
}

export async function runAfterCommitHooks(hooks: PendingHook[]): Promise<void> {
  for (const { name, hook } of hooks) {
    try {
      await hook();
    } catch (err) {
      logger.error("After-commit hook failed", { hook: name, error: errorMessage(err) });
    }
  }
}
