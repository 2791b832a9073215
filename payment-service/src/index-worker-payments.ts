import { shutdownTracing } from "./tracing";
import { pool } from "./db/client";
import { createServices } from "./container";
import { connectKafka, disconnectKafka } from "./kafka";
import { logger } from "./logger";
import { closeRabbit, connectRabbit, consumePaymentRequests, publishPaymentResult } from "./rabbit";

async function main(): Promise<void> {
  await connectRabbit();
  await connectKafka();
  const { orchestrator } = createServices(pool);

  await consumePaymentRequests(async (msg) => {
    const { traceId, ...request } = msg;
    const result = await orchestrator.processPayment(request, traceId);
    const published = await publishPaymentResult(
      result.ok
        ? {
            traceId,
            orderId: msg.orderId,
            transactionId: result.value.transactionId,
            success: result.value.success,
            status: result.value.status,
            message: result.value.message,
          }
        : {
            traceId,
            orderId: msg.orderId,
            transactionId: null,
            success: false,
            status: "FAILED",
            message: result.error.message,
          }
    );
    if (!published) {
      logger.error("Failed to send payment result to RabbitMQ", { traceId, orderId: msg.orderId });
    }
  });

  logger.info("Payment worker started: consuming payment_requests, sending results to payment_results");
}

main().catch((err) => {
  logger.error("Payment worker startup failed", { error: String(err) });
  process.exit(1);
});

process.on("SIGTERM", () => {
  Promise.allSettled([shutdownTracing(), disconnectKafka(), closeRabbit(), pool.end()]).finally(() => process.exit(0));
});
