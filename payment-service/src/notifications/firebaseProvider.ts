import { cert, getApps, initializeApp } from "firebase-admin/app";
import { getMessaging } from "firebase-admin/messaging";
import type { Message, Messaging, MulticastMessage, SendResponse } from "firebase-admin/messaging";
import { errorMessage, logger } from "../logger";
import type { ProviderInitResult, PushErrorCode, PushMessage, PushProvider, SendResult } from "./pushProvider";

// FCM rejects multicast requests with more tokens than this.
const MULTICAST_LIMIT = 500;

const ERROR_CODES: Record<string, PushErrorCode> = {
  "messaging/registration-token-not-registered": "UNREGISTERED",
  "messaging/invalid-registration-token": "INVALID_ARGUMENT",
  "messaging/invalid-argument": "INVALID_ARGUMENT",
  "messaging/server-unavailable": "UNAVAILABLE",
  "messaging/unavailable": "UNAVAILABLE",
  "messaging/internal-error": "INTERNAL",
  "messaging/message-rate-exceeded": "QUOTA_EXCEEDED",
  "messaging/device-message-rate-exceeded": "QUOTA_EXCEEDED",
  "messaging/topics-message-rate-exceeded": "QUOTA_EXCEEDED",
  "messaging/quota-exceeded": "QUOTA_EXCEEDED",
};

export function classifyFirebaseError(err: unknown): { errorCode: PushErrorCode; errorMessage: string } {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return { errorCode: ERROR_CODES[err.code] ?? "UNKNOWN", errorMessage: errorMessage(err) };
  }
  return { errorCode: "UNKNOWN", errorMessage: errorMessage(err) };
}

function toSendResult(response: SendResponse): SendResult {
  if (response.success && response.messageId) {
    return { success: true, messageId: response.messageId };
  }
  return { success: false, ...classifyFirebaseError(response.error) };
}

export class FirebasePushProvider implements PushProvider {
  constructor(private readonly messaging: Messaging) {}

  async send(token: string, message: PushMessage): Promise<SendResult> {
    const fcmMessage: Message = {
      token,
      notification: { title: message.title, body: message.body },
      data: message.data,
      android: {
        priority: "high",
        notification: { sound: "default", color: "#1E88E5" },
      },
      apns: { payload: { aps: { sound: "default" } } },
    };
    try {
      const messageId = await this.messaging.send(fcmMessage);
      return { success: true, messageId };
    } catch (err) {
      return { success: false, ...classifyFirebaseError(err) };
    }
  }

  async sendMulticast(tokens: string[], message: PushMessage): Promise<SendResult[]> {
    const results: SendResult[] = [];
    for (let start = 0; start < tokens.length; start += MULTICAST_LIMIT) {
      const chunk = tokens.slice(start, start + MULTICAST_LIMIT);
      const multicast: MulticastMessage = {
        tokens: chunk,
        notification: { title: message.title, body: message.body },
        data: message.data,
        android: { priority: "high" },
      };
      try {
        const batch = await this.messaging.sendEachForMulticast(multicast);
        results.push(...batch.responses.map(toSendResult));
      } catch (err) {
        const failure = classifyFirebaseError(err);
        results.push(...chunk.map((): SendResult => ({ success: false, ...failure })));
      }
    }
    return results;
  }

  async sendToTopic(topic: string, message: PushMessage): Promise<SendResult> {
    try {
      const messageId = await this.messaging.send({
        topic,
        notification: { title: message.title, body: message.body },
        data: message.data,
      });
      return { success: true, messageId };
    } catch (err) {
      return { success: false, ...classifyFirebaseError(err) };
    }
  }
}

/** Initializes the Firebase Admin SDK once at startup; failure leaves push delivery disabled. */
export function initializeFirebasePush(credentialsFile: string): ProviderInitResult {
  try {
    const existing = getApps();
    const app = existing.length > 0 ? existing[0] : initializeApp({ credential: cert(credentialsFile) });
    logger.info(existing.length > 0 ? "Firebase Admin SDK already initialized" : "Firebase Admin SDK initialized successfully");
    return { ready: true, provider: new FirebasePushProvider(getMessaging(app)) };
  } catch (err) {
    const reason = errorMessage(err);
    logger.error("Failed to initialize Firebase Admin SDK", { error: reason, credentialsFile });
    logger.warn("Push notifications are disabled until Firebase credentials are configured");
    return { ready: false, reason };
  }
}
