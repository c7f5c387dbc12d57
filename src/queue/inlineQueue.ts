import { randomUUID } from "crypto";
import { JobRepo } from "../repositories/types";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { runJobAttempt } from "./runner";
import {
  JobHandle,
  JobHandlers,
  JobQueue,
  JobSpec,
  JobState,
  JobType,
  toJobState,
} from "./types";

const logger = createLogger("inline-queue");

export type Sleep = (ms: number) => Promise<void>;

const sleep: Sleep = (ms) => new Promise((res) => setTimeout(res, ms));

/**
 * Runs jobs in the current process, in the background of the request that
 * enqueued them. Job state is still persisted, so polling behaves exactly as
 * with the broker-backed queue.
 */
export class InlineJobQueue implements JobQueue {
  private readonly running = new Set<Promise<void>>();

  constructor(
    private readonly jobs: JobRepo,
    private readonly handlers: JobHandlers,
    private readonly wait: Sleep = sleep
  ) {}

  async enqueue<T extends JobType>(spec: JobSpec<T>): Promise<JobHandle> {
    const job = await this.jobs.create({
      id: randomUUID(),
      type: spec.type,
      payload: spec.payload,
      maxRetries: spec.maxRetries,
      backoffMs: spec.backoffMs,
    });

    const run = this.run(job.id)
      .catch((err) => {
        logger.error({ jobId: job.id, error: errorMessage(err) }, "Job runner crashed");
      })
      .finally(() => {
        this.running.delete(run);
      });
    this.running.add(run);

    return { id: job.id };
  }

  async poll(id: string): Promise<JobState | undefined> {
    const job = await this.jobs.findById(id);
    return job && toJobState(job);
  }

  /** Resolves once every job enqueued so far has settled. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  private async run(jobId: string) {
    for (;;) {
      const outcome = await runJobAttempt(this.jobs, this.handlers, jobId);
      if (outcome.kind !== "retry") {
        return;
      }
      await this.wait(outcome.delayMs);
    }
  }
}
