import { type IsolationLevel, Kysely } from "kysely";
import { DB } from "../../types/db";
import { Repositories, Store } from "../types";
import { config } from "../../config";
import { databaseErrorCode } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import {
  createCategoryRepo,
  createListingRepo,
  createParameterRepo,
  createProductRepo,
  createShopRepo,
} from "./catalog";
import { createCartRepo, createOrderRepo } from "./orders";
import { createContactRepo, createUserRepo } from "./users";
import { createJobRepo } from "./jobs";

const logger = createLogger("store");

// Serialization failures and deadlocks; the whole transaction can be rerun.
const RETRYABLE_CODES = new Set(["40001", "40P01"]);

function createRepositories(db: Kysely<DB>): Repositories {
  return {
    users: createUserRepo(db),
    shops: createShopRepo(db),
    categories: createCategoryRepo(db),
    products: createProductRepo(db),
    listings: createListingRepo(db),
    parameters: createParameterRepo(db),
    contacts: createContactRepo(db),
    carts: createCartRepo(db),
    orders: createOrderRepo(db),
    jobs: createJobRepo(db),
  };
}

export interface KyselyStoreOptions {
  isolationLevel?: IsolationLevel;
  maxAttempts?: number;
}

export function createKyselyStore(
  db: Kysely<DB>,
  {
    isolationLevel = config.DB_ISOLATION_LEVEL,
    maxAttempts = config.DB_TRANSACTION_ATTEMPTS,
  }: KyselyStoreOptions = {}
): Store {
  return {
    ...createRepositories(db),
    async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
      for (let attempt = 1; ; attempt++) {
        try {
          return await db
            .transaction()
            .setIsolationLevel(isolationLevel)
            .execute((trx) => work(createRepositories(trx)));
        } catch (error) {
          const code = databaseErrorCode(error);
          if (attempt >= maxAttempts || code === undefined || !RETRYABLE_CODES.has(code)) {
            throw error;
          }
          logger.warn({ code, attempt }, "Retrying transaction");
        }
      }
    },
  };
}
