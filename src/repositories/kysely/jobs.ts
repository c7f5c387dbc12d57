import { Kysely } from "kysely";
import { DB } from "../../types/db";
import { JobRepo } from "../types";
import { toJob } from "./mappers";

export function createJobRepo(db: Kysely<DB>): JobRepo {
  return {
    async create({ id, type, payload, maxRetries, backoffMs }) {
      const row = await db
        .insertInto("jobs")
        .values({
          id,
          type,
          payload: JSON.stringify(payload),
          status: "pending",
          attempts: 0,
          max_retries: maxRetries,
          backoff_ms: backoffMs,
          result: null,
          error: null,
        })
        .returningAll()
        .executeTakeFirstOrThrow();
      return toJob(row);
    },

    async findById(id) {
      const row = await db
        .selectFrom("jobs")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row && toJob(row);
    },

    async recordAttempt(id, attempts) {
      await db
        .updateTable("jobs")
        .set({ attempts, updated_at: new Date() })
        .where("id", "=", id)
        .execute();
    },

    async markSuccess(id, attempts, result) {
      await db
        .updateTable("jobs")
        .set({
          status: "success",
          attempts,
          result: JSON.stringify(result ?? null),
          error: null,
          updated_at: new Date(),
        })
        .where("id", "=", id)
        .execute();
    },

    async markFailure(id, attempts, error) {
      await db
        .updateTable("jobs")
        .set({ status: "failure", attempts, error, updated_at: new Date() })
        .where("id", "=", id)
        .execute();
    },
  };
}
