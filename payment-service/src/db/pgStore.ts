import type { Pool } from "pg";
import { poolQuery, withTransaction } from "./client";
import { createPaymentRepository } from "./payments";
import { createCartRepository, createLibraryRepository, createOrderRepository } from "./orders";
import { runAfterCommitHooks } from "../store";
import type { PendingHook, Store, UnitOfWork } from "../store";

export function createPgStore(db: Pool): Store {
  const query = poolQuery(db);
  return {
    payments: createPaymentRepository(query),
    orders: createOrderRepository(query),
    carts: createCartRepository(query),

    async transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
      const hooks: PendingHook[] = [];
      const result = await withTransaction(db, (txQuery) =>
        work({
          payments: createPaymentRepository(txQuery),
          orders: createOrderRepository(txQuery),
          library: createLibraryRepository(txQuery),
          afterCommit: (name, hook) => {
            hooks.push({ name, hook });
          },
        })
      );
      await runAfterCommitHooks(hooks);
      return result;
    },
  };
}
