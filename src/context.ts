import { config } from "./config";
import { RetrySettings } from "./queue/jobs";
import { JobQueue } from "./queue/types";
import { Store } from "./repositories/types";
import { TransitionPolicy } from "./services/orderStatus";

export interface ServiceSettings extends RetrySettings {
  transitions: TransitionPolicy;
}

/** Everything a request handler needs; built once at start-up. */
export interface AppContext {
  store: Store;
  queue: JobQueue;
  settings: ServiceSettings;
}

export function settingsFromConfig(): ServiceSettings {
  return {
    transitions: config.ORDER_TRANSITIONS,
    maxRetries: config.JOB_MAX_RETRIES,
    importRetryDelayMs: config.IMPORT_RETRY_DELAY_MS,
    emailRetryDelayMs: config.EMAIL_RETRY_DELAY_MS,
  };
}
