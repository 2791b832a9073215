export type PushErrorCode =
  | "UNREGISTERED"
  | "INVALID_ARGUMENT"
  | "UNAVAILABLE"
  | "INTERNAL"
  | "QUOTA_EXCEEDED"
  | "UNKNOWN";

/** Codes after which the provider will never accept the token again. */
export const PERMANENT_TOKEN_ERRORS: ReadonlySet<PushErrorCode> = new Set<PushErrorCode>([
  "UNREGISTERED",
  "INVALID_ARGUMENT",
]);

export function isPermanentTokenError(code: PushErrorCode): boolean {
  return PERMANENT_TOKEN_ERRORS.has(code);
}

export interface PushMessage {
  title: string;
  body: string;
  data: Record<string, string>;
}

export type SendResult =
  | { success: true; messageId: string }
  | { success: false; errorCode: PushErrorCode; errorMessage: string };

export interface PushProvider {
  send(token: string, message: PushMessage): Promise<SendResult>;
  /** One result per token, in the same order as `tokens`. */
  sendMulticast(tokens: string[], message: PushMessage): Promise<SendResult[]>;
  sendToTopic(topic: string, message: PushMessage): Promise<SendResult>;
}

export type ProviderInitResult = { ready: true; provider: PushProvider } | { ready: false; reason: string };
