export const PAYMENT_METHODS = ["CREDIT_CARD", "DEBIT_CARD", "PAYPAL", "STRIPE", "BANK_TRANSFER"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const PAYMENT_STATUSES = ["PROCESSING", "COMPLETED", "FAILED", "REFUNDED"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export type OrderStatus = "PENDING" | "PROCESSING" | "SHIPPED" | "DELIVERED" | "CANCELLED";

export type ItemType = "SONG" | "ALBUM";

/** Opaque method-specific details, e.g. `cardNumber`, `cardHolder`. */
export type PaymentDetails = Record<string, string>;

export interface PaymentMetadata {
  paymentDetails?: PaymentDetails;
  [key: string]: unknown;
}

export interface Payment {
  id: string;
  transactionId: string;
  orderId: string;
  userId: string;
  paymentMethod: PaymentMethod;
  status: PaymentStatus;
  amountCents: number;
  errorMessage: string | null;
  retryCount: number;
  metadata: PaymentMetadata;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

export type NewPayment = Pick<
  Payment,
  "id" | "transactionId" | "orderId" | "userId" | "paymentMethod" | "amountCents" | "metadata"
>;

/** Fields a state transition may rewrite. */
export interface PaymentPatch {
  status: PaymentStatus;
  errorMessage?: string | null;
  retryCount?: number;
  completedAt?: Date | null;
}

export interface PaymentView {
  id: string;
  transactionId: string;
  orderId: string;
  userId: string;
  paymentMethod: PaymentMethod;
  status: PaymentStatus;
  amountCents: number;
  errorMessage: string | null;
  retryCount: number;
  metadata: PaymentMetadata;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface OrderItem {
  itemId: string;
  itemType: ItemType;
  priceCents: number;
  quantity: number;
}

export interface Order {
  id: string;
  userId: string;
  orderNumber: string;
  status: OrderStatus;
  totalAmountCents: number;
  items: OrderItem[];
}

export interface OrderStatusChange {
  order: Order;
  previousStatus: OrderStatus;
  newStatus: OrderStatus;
}

export interface DeviceToken {
  userId: string;
  token: string;
  platform: string | null;
  createdAt: Date;
}

export type StepOutcome =
  | { step: string; ok: true }
  | { step: string; ok: false; error: string };

export interface PaymentResponse {
  success: boolean;
  transactionId: string | null;
  status: PaymentStatus;
  message: string;
  payment: PaymentView | null;
  sideEffects: StepOutcome[];
}

export type PaymentEventType = "payment_completed" | "payment_failed" | "payment_refunded" | "payment_retried";

export interface PaymentEvent {
  type: PaymentEventType;
  paymentId: string;
  transactionId: string;
  orderId: string;
  userId: string;
  amountCents: number;
  status: PaymentStatus;
  retryCount: number;
  errorMessage?: string | null;
}

export interface PaymentRequestMessage {
  traceId: string;
  orderId: string;
  userId: string;
  paymentMethod: PaymentMethod;
  amountCents: number;
  paymentDetails?: PaymentDetails;
}

export interface PaymentResultMessage {
  traceId: string;
  orderId: string;
  transactionId: string | null;
  success: boolean;
  status: PaymentStatus;
  message: string;
}
