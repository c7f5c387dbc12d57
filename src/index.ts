import { createApp } from "./app";
import { config } from "./config";
import { AppContext, settingsFromConfig } from "./context";
import { getSQLClient } from "./db";
import { InlineJobQueue } from "./queue/inlineQueue";
import { createJobHandlers } from "./queue/jobs";
import { AmqpJobQueue } from "./queue/producer";
import { JobQueue } from "./queue/types";
import { createKyselyStore } from "./repositories/kysely";
import { Store } from "./repositories/types";
import { createMailer } from "./services/mailer";
import logger from "./utils/logger";

function createQueue(store: Store): JobQueue {
  if (config.JOB_DRIVER === "inline") {
    return new InlineJobQueue(store.jobs, createJobHandlers({ store, mailer: createMailer() }));
  }
  return new AmqpJobQueue(store.jobs);
}

const store = createKyselyStore(getSQLClient());
const ctx: AppContext = {
  store,
  queue: createQueue(store),
  settings: settingsFromConfig(),
};

createApp(ctx).listen(config.PORT, () => {
  logger.info(
    { port: config.PORT, jobDriver: config.JOB_DRIVER },
    `Marketplace API running on port ${config.PORT}`
  );
});
