import type { Pool } from "pg";
import { config } from "./config";
import { poolQuery } from "./db/client";
import { createPgStore } from "./db/pgStore";
import { createTokenRegistry } from "./db/tokens";
import { GatewaySimulator } from "./gateway";
import { kafkaPaymentEvents } from "./kafka";
import { NotificationDispatcher } from "./notifications/dispatcher";
import { initializeFirebasePush } from "./notifications/firebaseProvider";
import { PushPurchaseNotifier } from "./notifications/purchaseNotifier";
import { PaymentOrchestrator } from "./paymentOrchestrator";
import type { TokenRegistry } from "./store";

export interface Services {
  orchestrator: PaymentOrchestrator;
  dispatcher: NotificationDispatcher;
  tokens: TokenRegistry;
}

export function createServices(db: Pool): Services {
  const tokens = createTokenRegistry(poolQuery(db));
  const dispatcher = new NotificationDispatcher(initializeFirebasePush(config.firebaseCredentialsFile), tokens);
  const orchestrator = new PaymentOrchestrator({
    store: createPgStore(db),
    gateway: new GatewaySimulator(config.gateway),
    notifier: new PushPurchaseNotifier(dispatcher),
    events: kafkaPaymentEvents,
    cardPrefixDigits: config.gateway.blockedCardPrefix.length,
  });
  return { orchestrator, dispatcher, tokens };
}
