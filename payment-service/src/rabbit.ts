import amqp from "amqplib";
import { z } from "zod";
import { config } from "./config";
import { errorMessage, logger } from "./logger";
import { PAYMENT_METHODS } from "./types";
import type { PaymentRequestMessage, PaymentResultMessage } from "./types";

const QUEUE_PAYMENT_REQUESTS = "payment_requests";
const QUEUE_PAYMENT_RESULTS = "payment_results";

interface AmqpConnection {
  createChannel(): Promise<amqp.Channel>;
  close(): Promise<void>;
}

const paymentRequestMessageSchema = z.object({
  traceId: z.string().default("unknown"),
  orderId: z.string(),
  userId: z.string(),
  paymentMethod: z.enum(PAYMENT_METHODS),
  amountCents: z.number(),
  paymentDetails: z.record(z.string()).optional(),
});

let connection: AmqpConnection | null = null;
let channel: amqp.Channel | null = null;

export async function connectRabbit(): Promise<void> {
  const conn = (await amqp.connect(config.rabbitmqUrl)) as unknown as AmqpConnection;
  connection = conn;
  channel = await conn.createChannel();
  await channel.assertQueue(QUEUE_PAYMENT_REQUESTS, { durable: true });
  await channel.assertQueue(QUEUE_PAYMENT_RESULTS, { durable: true });
  logger.info("RabbitMQ connected");
}

export function parsePaymentRequestMessage(raw: string): PaymentRequestMessage {
  return paymentRequestMessageSchema.parse(JSON.parse(raw));
}

export async function publishPaymentResult(result: PaymentResultMessage): Promise<boolean> {
  if (!channel) return false;
  return channel.sendToQueue(QUEUE_PAYMENT_RESULTS, Buffer.from(JSON.stringify(result)), { persistent: true });
}

/**
 * Consumes payment requests one at a time. Malformed messages are dropped;
 * a handler failure requeues the message.
 */
export async function consumePaymentRequests(
  onMessage: (msg: PaymentRequestMessage) => Promise<void>
): Promise<void> {
  const ch = channel;
  if (!ch) throw new Error("RabbitMQ channel not ready");
  await ch.prefetch(1);
  await ch.consume(QUEUE_PAYMENT_REQUESTS, async (raw) => {
    if (!raw) return;
    let msg: PaymentRequestMessage;
    try {
      msg = parsePaymentRequestMessage(raw.content.toString());
    } catch (err) {
      logger.error("Dropping malformed payment request", { error: errorMessage(err) });
      ch.nack(raw, false, false);
      return;
    }
    try {
      await onMessage(msg);
      ch.ack(raw);
    } catch (err) {
      logger.error("Failed to process payment request", { traceId: msg.traceId, orderId: msg.orderId, error: errorMessage(err) });
      ch.nack(raw, false, true);
    }
  });
}

export async function closeRabbit(): Promise<void> {
  try {
    if (channel) await channel.close();
    if (connection) await connection.close();
  } catch (err) {
    logger.warn("RabbitMQ close failed", { error: errorMessage(err) });
  }
}
