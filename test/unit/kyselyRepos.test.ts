import { Kysely } from "kysely";
import { beforeEach, describe, expect, it } from "vitest";
import { createKyselyStore } from "../../src/repositories/kysely";
import {
  createListingRepo,
  createParameterRepo,
  createProductRepo,
} from "../../src/repositories/kysely/catalog";
import { createCartRepo } from "../../src/repositories/kysely/orders";
import { DB } from "../../src/types/db";
import { SqlRecorder, createRecordingDb } from "../support/sqlRecorder";

const pgError = (code: string) => Object.assign(new Error(`pg error ${code}`), { code });

describe("kysely repositories", () => {
  let db: Kysely<DB>;
  let recorder: SqlRecorder;
  const createdAt = new Date("2026-01-05T10:00:00Z");

  beforeEach(() => {
    ({ db, recorder } = createRecordingDb());
  });

  describe("carts", () => {
    it("adds a line or increments the stored quantity in one statement", async () => {
      recorder.reply({ rows: [{ id: 9, cart_id: 4, listing_id: 7, quantity: 5 }] });

      const line = await createCartRepo(db).addLine(4, 7, 2);

      expect(line).toEqual({ id: 9, cartId: 4, listingId: 7, quantity: 5 });
      expect(recorder.queries).toHaveLength(1);
      expect(recorder.queries[0].sql).toBe(
        'insert into "cart_lines" ("cart_id", "listing_id", "quantity") values ($1, $2, $3) ' +
          'on conflict ("cart_id", "listing_id") do update set ' +
          '"quantity" = "cart_lines"."quantity" + "excluded"."quantity" returning *'
      );
      expect(recorder.queries[0].parameters).toEqual([4, 7, 2]);
    });

    it("creates the basket only if the user has none, then reads it back", async () => {
      recorder.reply({}, { rows: [{ id: 4, user_id: 2, created_at: createdAt }] });

      const cart = await createCartRepo(db).getOrCreate(2);

      expect(cart).toEqual({ id: 4, userId: 2, createdAt });
      expect(recorder.sql).toEqual([
        'insert into "carts" ("user_id") values ($1) on conflict ("user_id") do nothing',
        'select * from "carts" where "user_id" = $1',
      ]);
      expect(recorder.queries.map((query) => query.parameters)).toEqual([[2], [2]]);
    });

    it("locks the basket row when asked to", async () => {
      const carts = createCartRepo(db);

      expect(await carts.findByUser(2, { forUpdate: true })).toBeUndefined();
      await carts.findByUser(2);

      expect(recorder.sql).toEqual([
        'select * from "carts" where "user_id" = $1 for update',
        'select * from "carts" where "user_id" = $1',
      ]);
    });
  });

  describe("catalog", () => {
    it("deletes every listing of a shop and reports the count", async () => {
      recorder.reply({ numAffectedRows: BigInt(3) });

      expect(await createListingRepo(db).deleteByShop(1)).toBe(3);
      expect(recorder.sql).toEqual(['delete from "listings" where "shop_id" = $1']);
      expect(recorder.queries[0].parameters).toEqual([1]);
    });

    it("returns the existing product when the name is already taken in the category", async () => {
      recorder.reply({ rows: [{ id: 12, name: "X1", category_id: 1 }] });

      const product = await createProductRepo(db).create({ name: "X1", categoryId: 1 });

      expect(product).toEqual({ id: 12, name: "X1", categoryId: 1 });
      expect(recorder.sql).toEqual([
        'insert into "products" ("name", "category_id") values ($1, $2) ' +
          'on conflict ("name", "category_id") do update set "name" = $3 returning *',
      ]);
      expect(recorder.queries[0].parameters).toEqual(["X1", 1, "X1"]);
    });

    it("upserts parameter names and listing values", async () => {
      recorder.reply({ rows: [{ id: 3, name: "color" }] });
      const parameters = createParameterRepo(db);

      expect(await parameters.findOrCreate("color")).toEqual({ id: 3, name: "color" });
      await parameters.setValue(10, 3, "black");

      expect(recorder.sql).toEqual([
        'insert into "parameters" ("name") values ($1) ' +
          'on conflict ("name") do update set "name" = $2 returning "id", "name"',
        'insert into "listing_parameters" ("listing_id", "parameter_id", "value") values ($1, $2, $3) ' +
          'on conflict ("listing_id", "parameter_id") do update set "value" = $4',
      ]);
      expect(recorder.queries[1].parameters).toEqual([10, 3, "black", "black"]);
    });
  });

  describe("transactions", () => {
    it("reruns the transaction after a serialization failure", async () => {
      const store = createKyselyStore(db, { isolationLevel: "serializable", maxAttempts: 3 });
      recorder.reply(pgError("40001"), {
        rows: [{ id: 4, user_id: 2, created_at: createdAt }],
      });

      const cart = await store.transaction((repos) => repos.carts.findByUser(2));

      expect(cart).toEqual({ id: 4, userId: 2, createdAt });
      expect(recorder.queries).toHaveLength(2);
    });

    it("gives up after the last attempt", async () => {
      const store = createKyselyStore(db, { maxAttempts: 2 });
      recorder.reply(pgError("40P01"), pgError("40P01"));

      await expect(
        store.transaction((repos) => repos.carts.findByUser(2))
      ).rejects.toMatchObject({ code: "40P01" });
      expect(recorder.queries).toHaveLength(2);
    });

    it("does not rerun on other database errors", async () => {
      const store = createKyselyStore(db, { maxAttempts: 3 });
      recorder.reply(pgError("23503"));

      await expect(
        store.transaction((repos) => repos.carts.addLine(4, 7, 1))
      ).rejects.toMatchObject({ code: "23503" });
      expect(recorder.queries).toHaveLength(1);
    });
  });
});
