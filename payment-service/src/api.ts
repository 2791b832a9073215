import express from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import cors from "cors";
import { v4 as uuidv4 } from "uuid";
import { trace } from "@opentelemetry/api";
import swaggerUi from "swagger-ui-express";
import { z } from "zod";
import { httpStatusFor } from "./errors";
import type { PaymentError, Result } from "./errors";
import { errorMessage, logger } from "./logger";
import type { PaymentOrchestrator } from "./paymentOrchestrator";
import type { TokenRegistry } from "./store";
import openApiDocument from "./openapi.json";

type RequestWithTraceId = Request & { traceId: string };

function getTraceId(req: Request): string {
  return (req as RequestWithTraceId).traceId;
}

export interface AppDeps {
  orchestrator: PaymentOrchestrator;
  tokens: TokenRegistry;
}

const registerTokenSchema = z.object({
  userId: z.string().min(1),
  token: z.string().min(1),
  platform: z.string().min(1).optional(),
});

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function sendError(res: Response, error: PaymentError, traceId: string, extra?: Record<string, string>): void {
  res.status(httpStatusFor(error.kind)).json({
    error: error.message,
    kind: error.kind,
    ...(error.issues && { issues: error.issues }),
    ...extra,
    traceId,
  });
}

function sendResult<T>(res: Response, result: Result<T>, traceId: string, extra?: Record<string, string>): void {
  if (result.ok) {
    res.json(result.value);
  } else {
    sendError(res, result.error, traceId, extra);
  }
}

export function createApp({ orchestrator, tokens }: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req, res, next) => {
    const header = req.headers["x-trace-id"];
    const traceId = typeof header === "string" && header ? header : uuidv4();
    (req as RequestWithTraceId).traceId = traceId;
    res.setHeader("X-Trace-Id", traceId);
    const span = trace.getActiveSpan();
    if (span) span.setAttribute("traceId", traceId);
    next();
  });

  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get("/api-docs.json", (_req, res) => res.json(openApiDocument));

  app.get("/health", (_req, res) => res.json({ status: "ok" }));

  app.post(
    "/api/payments/process",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(req);
      logger.info("POST /api/payments/process", { traceId });
      sendResult(res, await orchestrator.processPayment(req.body, traceId), traceId);
    })
  );

  app.post(
    "/api/payments/:id/retry",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(req);
      logger.info("POST /api/payments/:id/retry", { traceId, paymentId: req.params.id });
      sendResult(res, await orchestrator.retryPayment(req.params.id, traceId), traceId, { paymentId: req.params.id });
    })
  );

  app.post(
    "/api/payments/:id/refund",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(req);
      logger.info("POST /api/payments/:id/refund", { traceId, paymentId: req.params.id });
      sendResult(res, await orchestrator.refundPayment(req.params.id, traceId), traceId, { paymentId: req.params.id });
    })
  );

  app.get(
    "/api/payments/transaction/:transactionId",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(req);
      const { transactionId } = req.params;
      sendResult(res, await orchestrator.getPaymentByTransactionId(transactionId), traceId, { transactionId });
    })
  );

  app.get(
    "/api/payments/user/:userId",
    asyncRoute(async (req, res) => {
      res.json(await orchestrator.getPaymentsByUserId(req.params.userId));
    })
  );

  app.get(
    "/api/payments/order/:orderId",
    asyncRoute(async (req, res) => {
      res.json(await orchestrator.getPaymentsByOrderId(req.params.orderId));
    })
  );

  app.get(
    "/api/payments/:id",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(req);
      sendResult(res, await orchestrator.getPaymentById(req.params.id), traceId, { paymentId: req.params.id });
    })
  );

  app.post(
    "/api/notifications/tokens",
    asyncRoute(async (req, res) => {
      const traceId = getTraceId(req);
      const parsed = registerTokenSchema.safeParse(req.body);
      if (!parsed.success) {
        sendError(
          res,
          {
            kind: "VALIDATION_ERROR",
            message: "Invalid token registration",
            issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
          },
          traceId
        );
        return;
      }
      const { userId, token, platform } = parsed.data;
      const registered = await tokens.register(userId, token, platform);
      logger.info("Push token registered", { traceId, userId });
      res.status(201).json({ userId: registered.userId, platform: registered.platform, createdAt: registered.createdAt });
    })
  );

  app.delete(
    "/api/notifications/tokens/:token",
    asyncRoute(async (req, res) => {
      const removed = await tokens.deleteByToken(req.params.token);
      logger.info("Push token removal requested", { traceId: getTraceId(req), removed });
      res.status(204).end();
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const traceId = getTraceId(req);
    // body-parser marks malformed JSON with a 4xx status
    if (typeof err === "object" && err !== null && "status" in err && err.status === 400) {
      logger.warn("Malformed request body", { traceId, path: req.path });
      res.status(400).json({ error: "Malformed JSON body", kind: "VALIDATION_ERROR", traceId });
      return;
    }
    logger.error("Unhandled request error", { traceId, path: req.path, error: errorMessage(err) });
    res.status(500).json({ error: "Internal server error", traceId });
  });

  return app;
}
