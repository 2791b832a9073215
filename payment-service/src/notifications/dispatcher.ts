import { errorMessage, logger } from "../logger";
import type { TokenRegistry } from "../store";
import { isPermanentTokenError } from "./pushProvider";
import type { ProviderInitResult, PushMessage, PushProvider, SendResult } from "./pushProvider";

const REFERENCE_ID_KEY = "referenceId";
const REFERENCE_TYPE_KEY = "referenceType";

export interface NotificationContent {
  title: string;
  body: string;
  /** Machine-readable tag, e.g. PURCHASE_SUCCESS. */
  type: string;
  referenceId?: string;
  referenceType?: string;
}

export interface MulticastReport {
  successCount: number;
  failureCount: number;
  removedTokens: string[];
}

function toPushMessage(content: NotificationContent): PushMessage {
  const data: Record<string, string> = { type: content.type };
  if (content.referenceId !== undefined) data[REFERENCE_ID_KEY] = content.referenceId;
  if (content.referenceType !== undefined) data[REFERENCE_TYPE_KEY] = content.referenceType;
  return { title: content.title, body: content.body, data };
}

async function safeSend(send: () => Promise<SendResult>): Promise<SendResult> {
  try {
    return await send();
  } catch (err) {
    return { success: false, errorCode: "UNKNOWN", errorMessage: errorMessage(err) };
  }
}

/**
 * Delivers push notifications to users, devices and topics.
 *
 * The provider's initialization result is captured at construction; when it was
 * not ready every send logs and reports failure instead of throwing. Tokens the
 * provider reports as permanently invalid are removed from the registry.
 */
export class NotificationDispatcher {
  private readonly provider: PushProvider | null;

  constructor(
    init: ProviderInitResult,
    private readonly tokens: TokenRegistry
  ) {
    this.provider = init.ready ? init.provider : null;
    if (!init.ready) {
      logger.warn("Notification dispatcher started without a push provider", { reason: init.reason });
    }
  }

  isReady(): boolean {
    return this.provider !== null;
  }

  async sendToSingleUser(userId: string, content: NotificationContent): Promise<boolean> {
    if (!this.provider) {
      logger.error("Cannot send notification: push provider not initialized", { userId });
      return false;
    }
    try {
      const devices = await this.tokens.findByUserId(userId);
      if (devices.length === 0) {
        logger.warn("No push tokens registered for user", { userId });
        return false;
      }
      const delivered = await Promise.all(devices.map((device) => this.sendToToken(device.token, content)));
      const successCount = delivered.filter(Boolean).length;
      logger.info("Sent notifications to user", {
        userId,
        type: content.type,
        successCount,
        failureCount: delivered.length - successCount,
      });
      return successCount > 0;
    } catch (err) {
      logger.error("Error sending notification to user", { userId, error: errorMessage(err) });
      return false;
    }
  }

  async sendToToken(token: string, content: NotificationContent): Promise<boolean> {
    const provider = this.provider;
    if (!provider) {
      logger.error("Cannot send notification to token: push provider not initialized");
      return false;
    }
    const result = await safeSend(() => provider.send(token, toPushMessage(content)));
    if (result.success) {
      logger.debug("Push message sent", { messageId: result.messageId, type: content.type });
      return true;
    }
    logger.warn("Push message rejected", { errorCode: result.errorCode, error: result.errorMessage });
    if (isPermanentTokenError(result.errorCode)) {
      await this.removeToken(token);
    }
    return false;
  }

  async sendMulticast(tokens: string[], content: NotificationContent): Promise<MulticastReport> {
    if (!this.provider) {
      logger.error("Cannot send multicast notification: push provider not initialized");
      return { successCount: 0, failureCount: tokens.length, removedTokens: [] };
    }
    if (tokens.length === 0) {
      logger.warn("No tokens provided for multicast message");
      return { successCount: 0, failureCount: 0, removedTokens: [] };
    }

    let results: SendResult[];
    try {
      results = await this.provider.sendMulticast(tokens, toPushMessage(content));
    } catch (err) {
      logger.error("Error sending multicast message", { error: errorMessage(err) });
      return { successCount: 0, failureCount: tokens.length, removedTokens: [] };
    }

    const invalid = new Set<string>();
    let successCount = 0;
    tokens.forEach((token, i) => {
      const result: SendResult | undefined = results[i];
      if (result === undefined) return;
      if (result.success) {
        successCount++;
      } else if (isPermanentTokenError(result.errorCode)) {
        invalid.add(token);
      }
    });

    const removedTokens: string[] = [];
    for (const token of invalid) {
      if (await this.removeToken(token)) removedTokens.push(token);
    }

    const report = { successCount, failureCount: tokens.length - successCount, removedTokens };
    logger.info("Multicast message sent", { type: content.type, ...report });
    return report;
  }

  async sendToTopic(topic: string, content: NotificationContent): Promise<boolean> {
    const provider = this.provider;
    if (!provider) {
      logger.error("Cannot send notification to topic: push provider not initialized", { topic });
      return false;
    }
    const result = await safeSend(() => provider.sendToTopic(topic, toPushMessage(content)));
    if (result.success) {
      logger.info("Sent message to topic", { topic, messageId: result.messageId });
      return true;
    }
    logger.error("Error sending message to topic", { topic, errorCode: result.errorCode, error: result.errorMessage });
    return false;
  }

  /** Returns true only when a stored token was actually removed. */
  private async removeToken(token: string): Promise<boolean> {
    try {
      const removed = await this.tokens.deleteByToken(token);
      if (removed > 0) logger.info("Removed invalid push token", { token });
      return removed > 0;
    } catch (err) {
      logger.error("Failed to remove invalid push token", { token, error: errorMessage(err) });
      return false;
    }
  }
}
