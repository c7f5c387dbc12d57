import amqp from "amqplib";
import { randomUUID } from "crypto";
import { config } from "../config";
import { JobRepo } from "../repositories/types";
import { errorMessage } from "../utils/errors";
import {
  JobHandle,
  JobMessage,
  JobQueue,
  JobSpec,
  JobState,
  JobType,
  toJobState,
} from "./types";

export async function sendJobToQueue(
  data: JobMessage,
  url = config.RABBITMQ_URL,
  queue = config.JOB_QUEUE
) {
  const conn = await amqp.connect(url);
  const ch = await conn.createChannel();

  await ch.assertQueue(queue, { durable: true });

  const message = JSON.stringify({ jobId: data.jobId, retry: data.retry });
  ch.sendToQueue(queue, Buffer.from(message), { persistent: true });

  await ch.close();
  await conn.close();
}

/** Persists the job, then hands its id to the `job-worker` through RabbitMQ. */
export class AmqpJobQueue implements JobQueue {
  constructor(private readonly jobs: JobRepo) {}

  async enqueue<T extends JobType>(spec: JobSpec<T>): Promise<JobHandle> {
    const job = await this.jobs.create({
      id: randomUUID(),
      type: spec.type,
      payload: spec.payload,
      maxRetries: spec.maxRetries,
      backoffMs: spec.backoffMs,
    });

    try {
      await sendJobToQueue({ jobId: job.id, retry: 0 });
    } catch (err) {
      await this.jobs.markFailure(job.id, 0, `Could not publish job: ${errorMessage(err)}`);
      throw err;
    }

    return { id: job.id };
  }

  async poll(id: string): Promise<JobState | undefined> {
    const job = await this.jobs.findById(id);
    return job && toJobState(job);
  }
}
