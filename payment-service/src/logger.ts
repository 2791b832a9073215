const SERVICE_NAME = process.env.SERVICE_NAME || "payment-service";
const LOKI_URL = process.env.LOKI_URL || "";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogContext {
  traceId?: string;
  orderId?: string;
  paymentId?: string;
  transactionId?: string;
  userId?: string;
  [key: string]: unknown;
}

function minimumLevel(): number {
  const configured = process.env.LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error" || configured === "silent") {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === "production" ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function formatLog(level: LogLevel, msg: string, context?: LogContext): string {
  const log = {
    timestamp: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    msg,
    ...(context || {}),
  };
  return JSON.stringify(log);
}

function pushToLoki(line: string, level: LogLevel, context?: LogContext): void {
  if (!LOKI_URL) return;
  const stream: Record<string, string> = { service: SERVICE_NAME, level };
  if (context?.traceId) stream.traceId = String(context.traceId);
  if (context?.orderId) stream.orderId = String(context.orderId);
  if (context?.transactionId) stream.transactionId = String(context.transactionId);
  const body = {
    streams: [
      {
        stream,
        values: [[String(Date.now() * 1_000_000), line]],
      },
    ],
  };
  fetch(`${LOKI_URL.replace(/\/$/, "")}/loki/api/v1/push`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }).catch((err: unknown) => {
    process.stderr.write(formatLog("warn", "Loki push failed", { error: String(err) }) + "\n");
  });
}

function write(level: LogLevel, msg: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < minimumLevel()) return;
  const line = formatLog(level, msg, context);
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
  pushToLoki(line, level, context);
}

export const logger = {
  info(msg: string, context?: LogContext): void {
    write("info", msg, context);
  },
  error(msg: string, context?: LogContext): void {
    write("error", msg, context);
  },
  warn(msg: string, context?: LogContext): void {
    write("warn", msg, context);
  },
  debug(msg: string, context?: LogContext): void {
    write("debug", msg, context);
  },
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
