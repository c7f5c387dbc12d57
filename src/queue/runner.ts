import { JobRepo } from "../repositories/types";
import { Job } from "../types/models";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import {
  JobHandlers,
  ZCatalogImportPayload,
  ZOrderEmailPayload,
} from "./types";

const logger = createLogger("job-runner");

export type AttemptOutcome =
  | { kind: "success"; result: unknown }
  | { kind: "retry"; delayMs: number }
  | { kind: "failure"; error: string }
  | { kind: "skipped" };

function dispatch(handlers: JobHandlers, job: Job): Promise<unknown> {
  switch (job.type) {
    case "catalog-import":
      return handlers["catalog-import"](ZCatalogImportPayload.parse(job.payload));
    case "order-email":
      return handlers["order-email"](ZOrderEmailPayload.parse(job.payload));
    default:
      throw new Error(`Unknown job type: ${job.type}`);
  }
}

const isKnownType = (type: string) =>
  type === "catalog-import" || type === "order-email";

/**
 * Runs one attempt of a pending job and records its outcome. The caller
 * decides how to wait before the next attempt when the outcome is `retry`.
 */
export async function runJobAttempt(
  jobs: JobRepo,
  handlers: JobHandlers,
  jobId: string
): Promise<AttemptOutcome> {
  const job = await jobs.findById(jobId);
  if (!job || job.status !== "pending") {
    logger.warn({ jobId }, "Job is missing or already settled");
    return { kind: "skipped" };
  }

  const attempt = job.attempts + 1;

  if (!isKnownType(job.type)) {
    const error = `Unknown job type: ${job.type}`;
    await jobs.markFailure(job.id, attempt, error);
    return { kind: "failure", error };
  }

  await jobs.recordAttempt(job.id, attempt);
  logger.info(
    { jobId, type: job.type },
    `Attempt ${attempt}/${job.maxRetries + 1}`
  );

  try {
    const result = await dispatch(handlers, job);
    await jobs.markSuccess(job.id, attempt, result);
    logger.info({ jobId, type: job.type }, "Job succeeded");
    return { kind: "success", result };
  } catch (err) {
    const message = errorMessage(err);

    if (attempt > job.maxRetries) {
      await jobs.markFailure(job.id, attempt, message);
      logger.error({ jobId, type: job.type, error: message }, "Max retries reached");
      return { kind: "failure", error: message };
    }

    logger.warn(
      { jobId, type: job.type, error: message },
      `Attempt ${attempt} failed, retrying in ${job.backoffMs / 1000}s`
    );
    return { kind: "retry", delayMs: job.backoffMs };
  }
}
