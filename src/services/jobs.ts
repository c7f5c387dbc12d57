import { JobQueue, JobState } from "../queue/types";
import { NotFoundError } from "../utils/errors";

export async function getJobStatus(queue: JobQueue, id: string): Promise<JobState> {
  const state = await queue.poll(id);
  if (!state) {
    throw new NotFoundError("Task not found");
  }
  return state;
}
