import amqp from "amqplib";
import { config } from "../config";
import { getSQLClient } from "../db";
import { createJobHandlers } from "../queue/jobs";
import { runJobAttempt } from "../queue/runner";
import { JobMessage } from "../queue/types";
import { createKyselyStore } from "../repositories/kysely";
import { createMailer } from "../services/mailer";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("job-worker");

function parseMessage(content: Buffer): JobMessage | undefined {
  try {
    const data: unknown = JSON.parse(content.toString());
    if (
      typeof data === "object" &&
      data !== null &&
      "jobId" in data &&
      typeof data.jobId === "string"
    ) {
      const retry = "retry" in data && typeof data.retry === "number" ? data.retry : 0;
      return { jobId: data.jobId, retry };
    }
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, "Message is not JSON");
  }
  return undefined;
}

async function main() {
  const store = createKyselyStore(getSQLClient());
  const handlers = createJobHandlers({ store, mailer: createMailer() });

  const conn = await amqp.connect(config.RABBITMQ_URL);
  const ch = await conn.createChannel();
  await ch.assertQueue(config.JOB_QUEUE, { durable: true });

  // One job at a time per worker
  await ch.prefetch(1);

  logger.info({ queue: config.JOB_QUEUE }, "Job worker started, waiting for jobs...");

  await ch.consume(config.JOB_QUEUE, async (msg) => {
    if (!msg) return;

    const message = parseMessage(msg.content);
    if (!message) {
      logger.error("Dropping malformed job message");
      ch.ack(msg);
      return;
    }

    const { jobId, retry } = message;
    try {
      const outcome = await runJobAttempt(store.jobs, handlers, jobId);
      if (outcome.kind === "retry") {
        setTimeout(() => {
          ch.sendToQueue(
            config.JOB_QUEUE,
            Buffer.from(JSON.stringify({ jobId, retry: retry + 1 })),
            { persistent: true }
          );
        }, outcome.delayMs);
      }
      ch.ack(msg);
    } catch (err) {
      // Store unavailable: leave the message to be redelivered.
      logger.error({ jobId, error: errorMessage(err) }, "Could not run job attempt");
      ch.nack(msg, false, true);
    }
  });
}

main().catch((err) => {
  logger.fatal({ error: errorMessage(err) }, "Job worker failed to start");
  process.exit(1);
});
