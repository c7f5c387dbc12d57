import { Kysely } from "kysely";
import { DB } from "../../types/db";
import { ContactRepo, UserRepo } from "../types";
import { toContact, toUser } from "./mappers";

export function createUserRepo(db: Kysely<DB>): UserRepo {
  return {
    async findById(id) {
      const row = await db
        .selectFrom("users")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row && toUser(row);
    },

    async findByIds(ids) {
      if (ids.length === 0) {
        return [];
      }
      const rows = await db
        .selectFrom("users")
        .selectAll()
        .where("id", "in", ids)
        .execute();
      return rows.map(toUser);
    },
  };
}

export function createContactRepo(db: Kysely<DB>): ContactRepo {
  return {
    async listByUser(userId) {
      const rows = await db
        .selectFrom("contacts")
        .selectAll()
        .where("user_id", "=", userId)
        .orderBy("id")
        .execute();
      return rows.map(toContact);
    },

    async findById(id) {
      const row = await db
        .selectFrom("contacts")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row && toContact(row);
    },

    async create(input) {
      const row = await db
        .insertInto("contacts")
        .values({
          user_id: input.userId,
          city: input.city,
          street: input.street,
          house: input.house,
          structure: input.structure,
          building: input.building,
          apartment: input.apartment,
          phone: input.phone,
        })
        .returningAll()
        .executeTakeFirstOrThrow();
      return toContact(row);
    },

    async delete(id, userId) {
      const result = await db
        .deleteFrom("contacts")
        .where("id", "=", id)
        .where("user_id", "=", userId)
        .executeTakeFirst();
      return result.numDeletedRows > 0;
    },
  };
}
