import { z } from "zod";
import { Job, JobStatus } from "../types/models";

export const ZCatalogImportPayload = z.object({
  url: z.string().min(1),
  shopName: z.string().min(1),
  ownerUserId: z.number().int().nullable().optional(),
});

export const ZEmailTemplate = z.enum(["order-confirmed", "order-status"]);

export const ZOrderEmailPayload = z.object({
  to: z.string().email(),
  template: ZEmailTemplate,
  context: z.object({
    orderId: z.number().int(),
    username: z.string(),
    status: z.string(),
    total: z.number(),
    items: z
      .object({ name: z.string(), quantity: z.number(), price: z.number() })
      .array()
      .default([]),
  }),
});

export type CatalogImportPayload = z.infer<typeof ZCatalogImportPayload>;
export type OrderEmailPayload = z.infer<typeof ZOrderEmailPayload>;
export type EmailTemplate = z.infer<typeof ZEmailTemplate>;

export interface JobPayloads {
  "catalog-import": CatalogImportPayload;
  "order-email": OrderEmailPayload;
}

export type JobType = keyof JobPayloads;

export interface JobSpec<T extends JobType = JobType> {
  type: T;
  payload: JobPayloads[T];
  /** Attempts after the first one. */
  maxRetries: number;
  /** Fixed delay between attempts. */
  backoffMs: number;
}

export interface JobHandle {
  id: string;
}

export interface JobState {
  id: string;
  type: string;
  status: JobStatus;
  attempts: number;
  result?: unknown;
  error?: string;
}

export type JobHandlers = {
  [T in JobType]: (payload: JobPayloads[T]) => Promise<unknown>;
};

/** What travels over the broker; the job itself lives in the jobs table. */
export interface JobMessage {
  jobId: string;
  retry: number;
}

export interface JobQueue {
  enqueue<T extends JobType>(spec: JobSpec<T>): Promise<JobHandle>;
  poll(id: string): Promise<JobState | undefined>;
}

export function toJobState(job: Job): JobState {
  return {
    id: job.id,
    type: job.type,
    status: job.status,
    attempts: job.attempts,
    ...(job.status === "success" && { result: job.result }),
    ...(job.status === "failure" && job.error !== null && { error: job.error }),
  };
}
