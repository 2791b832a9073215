import { Kafka } from "kafkajs";
import { config } from "./config";
import { logger } from "./logger";
import type { PaymentEvent } from "./types";

const TOPIC_PAYMENT_EVENTS = "payment-events";

export interface PaymentEventPublisher {
  publish(event: PaymentEvent, traceId?: string): Promise<void>;
}

let producer: Awaited<ReturnType<Kafka["producer"]>> | null = null;

export async function connectKafka(): Promise<void> {
  try {
    const kafka = new Kafka({
      clientId: config.serviceName,
      brokers: config.kafkaBrokers,
    });
    producer = kafka.producer();
    await producer.connect();
    logger.info("Kafka producer connected");
  } catch (err) {
    producer = null;
    logger.warn("Kafka unavailable, payment events will not be published", { error: String(err) });
  }
}

export async function publishPaymentEvent(event: PaymentEvent, traceId?: string): Promise<void> {
  if (!producer) {
    logger.debug("Kafka producer not connected, dropping payment event", { event: event.type });
    return;
  }
  await producer.send({
    topic: TOPIC_PAYMENT_EVENTS,
    messages: [
      {
        key: event.orderId,
        value: JSON.stringify({ event: event.type, ...event, timestamp: new Date().toISOString() }),
        headers: traceId ? { traceId } : undefined,
      },
    ],
  });
  logger.debug("Kafka event published", { event: event.type, orderId: event.orderId, transactionId: event.transactionId });
}

export const kafkaPaymentEvents: PaymentEventPublisher = { publish: publishPaymentEvent };

export async function disconnectKafka(): Promise<void> {
  if (!producer) return;
  try {
    await producer.disconnect();
  } catch (err) {
    logger.warn("Kafka disconnect failed", { error: String(err) });
  }
}
