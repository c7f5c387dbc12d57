import { Kysely } from "kysely";
import { DB } from "../../types/db";
import { ListingDetail, ListingFilter, ParameterValue } from "../../types/models";
import {
  CategoryRepo,
  ListingRepo,
  ParameterRepo,
  ProductRepo,
  ShopRepo,
} from "../types";
import { toListing, toShop } from "./mappers";

export function createShopRepo(db: Kysely<DB>): ShopRepo {
  return {
    async findById(id) {
      const row = await db
        .selectFrom("shops")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row && toShop(row);
    },

    async findByName(name) {
      const row = await db
        .selectFrom("shops")
        .selectAll()
        .where("name", "=", name)
        .executeTakeFirst();
      return row && toShop(row);
    },

    async findByOwner(userId) {
      const row = await db
        .selectFrom("shops")
        .selectAll()
        .where("user_id", "=", userId)
        .executeTakeFirst();
      return row && toShop(row);
    },

    async create({ name, url = "", userId = null }) {
      const row = await db
        .insertInto("shops")
        .values({ name, url, user_id: userId })
        .returningAll()
        .executeTakeFirstOrThrow();
      return toShop(row);
    },

    async listActive() {
      const rows = await db
        .selectFrom("shops")
        .selectAll()
        .where("is_active", "=", true)
        .orderBy("name", "desc")
        .execute();
      return rows.map(toShop);
    },

    async setActive(id, isActive) {
      await db
        .updateTable("shops")
        .set({ is_active: isActive })
        .where("id", "=", id)
        .execute();
    },
  };
}

export function createCategoryRepo(db: Kysely<DB>): CategoryRepo {
  return {
    async findById(id) {
      return db
        .selectFrom("categories")
        .select(["id", "name"])
        .where("id", "=", id)
        .executeTakeFirst();
    },

    async create(category) {
      // A concurrent import may have created it first; keep that row.
      await db
        .insertInto("categories")
        .values(category)
        .onConflict((oc) => oc.column("id").doNothing())
        .execute();
      return db
        .selectFrom("categories")
        .select(["id", "name"])
        .where("id", "=", category.id)
        .executeTakeFirstOrThrow();
    },

    async linkShop(categoryId, shopId) {
      await db
        .insertInto("category_shops")
        .values({ category_id: categoryId, shop_id: shopId })
        .onConflict((oc) => oc.columns(["category_id", "shop_id"]).doNothing())
        .execute();
    },

    async list() {
      return db
        .selectFrom("categories")
        .select(["id", "name"])
        .orderBy("name", "desc")
        .execute();
    },
  };
}

export function createProductRepo(db: Kysely<DB>): ProductRepo {
  return {
    async findByNameAndCategory(name, categoryId) {
      const row = await db
        .selectFrom("products")
        .selectAll()
        .where("name", "=", name)
        .where("category_id", "=", categoryId)
        .executeTakeFirst();
      return row && { id: row.id, name: row.name, categoryId: row.category_id };
    },

    async create({ name, categoryId }) {
      const row = await db
        .insertInto("products")
        .values({ name, category_id: categoryId })
        .onConflict((oc) =>
          oc.columns(["name", "category_id"]).doUpdateSet({ name })
        )
        .returningAll()
        .executeTakeFirstOrThrow();
      return { id: row.id, name: row.name, categoryId: row.category_id };
    },
  };
}

const detailQuery = (db: Kysely<DB>) =>
  db
    .selectFrom("listings as l")
    .innerJoin("products as p", "p.id", "l.product_id")
    .innerJoin("categories as c", "c.id", "p.category_id")
    .innerJoin("shops as s", "s.id", "l.shop_id")
    .selectAll("l")
    .select([
      "p.name as product_name",
      "p.category_id",
      "c.name as category_name",
      "s.name as shop_name",
      "s.url as shop_url",
      "s.user_id as shop_user_id",
      "s.is_active as shop_is_active",
    ]);

type DetailRow = Awaited<ReturnType<ReturnType<typeof detailQuery>["execute"]>>[number];

async function withParameters(
  db: Kysely<DB>,
  rows: DetailRow[]
): Promise<ListingDetail[]> {
  if (rows.length === 0) {
    return [];
  }

  const parameterRows = await db
    .selectFrom("listing_parameters as lp")
    .innerJoin("parameters as pr", "pr.id", "lp.parameter_id")
    .select(["lp.listing_id", "pr.name", "lp.value"])
    .where(
      "lp.listing_id",
      "in",
      rows.map((row) => row.id)
    )
    .orderBy("pr.name")
    .execute();

  const byListing = new Map<number, ParameterValue[]>();
  for (const { listing_id, name, value } of parameterRows) {
    const list = byListing.get(listing_id) ?? [];
    list.push({ name, value });
    byListing.set(listing_id, list);
  }

  return rows.map((row) => ({
    ...toListing(row),
    product: {
      id: row.product_id,
      name: row.product_name,
      category: { id: row.category_id, name: row.category_name },
    },
    shop: {
      id: row.shop_id,
      name: row.shop_name,
      url: row.shop_url,
      userId: row.shop_user_id,
      isActive: row.shop_is_active,
    },
    parameters: byListing.get(row.id) ?? [],
  }));
}

export function createListingRepo(db: Kysely<DB>): ListingRepo {
  return {
    async deleteByShop(shopId) {
      const result = await db
        .deleteFrom("listings")
        .where("shop_id", "=", shopId)
        .executeTakeFirst();
      return Number(result.numDeletedRows);
    },

    async create(input) {
      const row = await db
        .insertInto("listings")
        .values({
          product_id: input.productId,
          shop_id: input.shopId,
          external_id: input.externalId,
          model: input.model,
          quantity: input.quantity,
          price: input.price,
          price_rrc: input.priceRrc,
        })
        .returningAll()
        .executeTakeFirstOrThrow();
      return toListing(row);
    },

    async findDetail(id) {
      const rows = await detailQuery(db).where("l.id", "=", id).execute();
      const [detail] = await withParameters(db, rows);
      return detail;
    },

    async findDetails(ids) {
      if (ids.length === 0) {
        return [];
      }
      const rows = await detailQuery(db)
        .where("l.id", "in", ids)
        .orderBy("l.id")
        .execute();
      return withParameters(db, rows);
    },

    async search(filter: ListingFilter) {
      let query = detailQuery(db);
      if (filter.shopId !== undefined) {
        query = query.where("l.shop_id", "=", filter.shopId);
      }
      if (filter.categoryId !== undefined) {
        query = query.where("p.category_id", "=", filter.categoryId);
      }
      if (filter.inStockOnly) {
        query = query.where("l.quantity", ">", 0);
      }
      if (filter.activeShopsOnly) {
        query = query.where("s.is_active", "=", true);
      }
      const rows = await query.orderBy("l.id").execute();
      return withParameters(db, rows);
    },

    async countByShop(shopId, { inStockOnly = false } = {}) {
      let query = db
        .selectFrom("listings")
        .select((eb) => eb.fn.countAll<number>().as("count"))
        .where("shop_id", "=", shopId);
      if (inStockOnly) {
        query = query.where("quantity", ">", 0);
      }
      const { count } = await query.executeTakeFirstOrThrow();
      return Number(count);
    },
  };
}

export function createParameterRepo(db: Kysely<DB>): ParameterRepo {
  return {
    async findOrCreate(name) {
      // The no-op update makes RETURNING yield the existing row too.
      return db
        .insertInto("parameters")
        .values({ name })
        .onConflict((oc) => oc.column("name").doUpdateSet({ name }))
        .returning(["id", "name"])
        .executeTakeFirstOrThrow();
    },

    async setValue(listingId, parameterId, value) {
      await db
        .insertInto("listing_parameters")
        .values({ listing_id: listingId, parameter_id: parameterId, value })
        .onConflict((oc) =>
          oc.columns(["listing_id", "parameter_id"]).doUpdateSet({ value })
        )
        .execute();
    },
  };
}
