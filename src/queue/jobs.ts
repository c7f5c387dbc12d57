import { Store } from "../repositories/types";
import { importCatalog } from "../services/catalogImport";
import { loadFeed } from "../services/feedLoader";
import { Mailer, renderEmail } from "../services/mailer";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import {
  CatalogImportPayload,
  JobHandle,
  JobHandlers,
  JobQueue,
  JobSpec,
  OrderEmailPayload,
} from "./types";

const logger = createLogger("jobs");

export interface RetrySettings {
  maxRetries: number;
  importRetryDelayMs: number;
  emailRetryDelayMs: number;
}

export const catalogImportJob = (
  payload: CatalogImportPayload,
  settings: RetrySettings
): JobSpec<"catalog-import"> => ({
  type: "catalog-import",
  payload,
  maxRetries: settings.maxRetries,
  backoffMs: settings.importRetryDelayMs,
});

export const orderEmailJob = (
  payload: OrderEmailPayload,
  settings: RetrySettings
): JobSpec<"order-email"> => ({
  type: "order-email",
  payload,
  maxRetries: settings.maxRetries,
  backoffMs: settings.emailRetryDelayMs,
});

/**
 * Queues an email about an order change that is already committed. If the
 * queue is unreachable the failure is logged and `null` is returned, so the
 * caller still reports the saved change.
 */
export async function queueOrderEmail(
  queue: JobQueue,
  payload: OrderEmailPayload,
  settings: RetrySettings
): Promise<JobHandle | null> {
  try {
    return await queue.enqueue(orderEmailJob(payload, settings));
  } catch (err) {
    logger.error(
      { orderId: payload.context.orderId, template: payload.template, error: errorMessage(err) },
      "Could not queue order email"
    );
    return null;
  }
}

export function createJobHandlers(deps: {
  store: Store;
  mailer: Mailer;
  loadFeed?: typeof loadFeed;
}): JobHandlers {
  const load = deps.loadFeed ?? loadFeed;

  return {
    "catalog-import": async ({ url, shopName, ownerUserId }) => {
      const feed = await load(url);
      return importCatalog(deps.store, feed, { shopName, ownerUserId });
    },
    "order-email": async (payload) => deps.mailer.send(renderEmail(payload)),
  };
}
