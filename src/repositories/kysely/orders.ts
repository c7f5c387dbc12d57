import { Kysely } from "kysely";
import { DB, OrderStatus } from "../../types/db";
import { CartRepo, OrderRepo } from "../types";
import { toCart, toCartLine, toOrder, toOrderLine } from "./mappers";

const CLOSED_STATUSES: OrderStatus[] = ["delivered", "canceled"];

export function createCartRepo(db: Kysely<DB>): CartRepo {
  return {
    async findByUser(userId, { forUpdate = false } = {}) {
      let query = db.selectFrom("carts").selectAll().where("user_id", "=", userId);
      if (forUpdate) {
        query = query.forUpdate();
      }
      const row = await query.executeTakeFirst();
      return row && toCart(row);
    },

    async getOrCreate(userId) {
      // carts.user_id is unique, so concurrent callers converge on one row.
      await db
        .insertInto("carts")
        .values({ user_id: userId })
        .onConflict((oc) => oc.column("user_id").doNothing())
        .execute();
      const row = await db
        .selectFrom("carts")
        .selectAll()
        .where("user_id", "=", userId)
        .executeTakeFirstOrThrow();
      return toCart(row);
    },

    async addLine(cartId, listingId, quantity) {
      const row = await db
        .insertInto("cart_lines")
        .values({ cart_id: cartId, listing_id: listingId, quantity })
        .onConflict((oc) =>
          oc.columns(["cart_id", "listing_id"]).doUpdateSet((eb) => ({
            quantity: eb("cart_lines.quantity", "+", eb.ref("excluded.quantity")),
          }))
        )
        .returningAll()
        .executeTakeFirstOrThrow();
      return toCartLine(row);
    },

    async updateLineQuantity(cartId, lineId, quantity) {
      const result = await db
        .updateTable("cart_lines")
        .set({ quantity })
        .where("id", "=", lineId)
        .where("cart_id", "=", cartId)
        .executeTakeFirst();
      return result.numUpdatedRows > 0;
    },

    async removeLines(cartId, lineIds) {
      if (lineIds.length === 0) {
        return 0;
      }
      const result = await db
        .deleteFrom("cart_lines")
        .where("cart_id", "=", cartId)
        .where("id", "in", lineIds)
        .executeTakeFirst();
      return Number(result.numDeletedRows);
    },

    async listLines(cartId) {
      const rows = await db
        .selectFrom("cart_lines")
        .selectAll()
        .where("cart_id", "=", cartId)
        .orderBy("id")
        .execute();
      return rows.map(toCartLine);
    },

    async delete(cartId) {
      await db.deleteFrom("carts").where("id", "=", cartId).execute();
    },
  };
}

export function createOrderRepo(db: Kysely<DB>): OrderRepo {
  return {
    async create({ userId, status, contactId }) {
      const row = await db
        .insertInto("orders")
        .values({ user_id: userId, status, contact_id: contactId })
        .returningAll()
        .executeTakeFirstOrThrow();
      return toOrder(row);
    },

    async addLines(orderId, lines) {
      if (lines.length === 0) {
        return;
      }
      await db
        .insertInto("order_lines")
        .values(
          lines.map((line) => ({
            order_id: orderId,
            listing_id: line.listingId,
            shop_id: line.shopId,
            product_name: line.productName,
            model: line.model,
            price: line.price,
            quantity: line.quantity,
            parameters: JSON.stringify(line.parameters),
          }))
        )
        .execute();
    },

    async findById(id) {
      const row = await db
        .selectFrom("orders")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst();
      return row && toOrder(row);
    },

    async listByUser(userId) {
      const rows = await db
        .selectFrom("orders")
        .selectAll()
        .where("user_id", "=", userId)
        .orderBy("created_at", "desc")
        .orderBy("id", "desc")
        .execute();
      return rows.map(toOrder);
    },

    async listContainingShop(shopId) {
      const rows = await db
        .selectFrom("orders")
        .selectAll()
        .where(({ exists, selectFrom }) =>
          exists(
            selectFrom("order_lines")
              .select("order_lines.id")
              .whereRef("order_lines.order_id", "=", "orders.id")
              .where("order_lines.shop_id", "=", shopId)
          )
        )
        .orderBy("created_at", "desc")
        .orderBy("id", "desc")
        .execute();
      return rows.map(toOrder);
    },

    async listLines(orderIds, { shopId } = {}) {
      if (orderIds.length === 0) {
        return [];
      }
      let query = db
        .selectFrom("order_lines")
        .selectAll()
        .where("order_id", "in", orderIds);
      if (shopId !== undefined) {
        query = query.where("shop_id", "=", shopId);
      }
      const rows = await query.orderBy("id").execute();
      return rows.map(toOrderLine);
    },

    async updateStatus(id, status) {
      await db
        .updateTable("orders")
        .set({ status })
        .where("id", "=", id)
        .execute();
    },

    async countOpenForShop(shopId) {
      const { count } = await db
        .selectFrom("orders")
        .innerJoin("order_lines", "order_lines.order_id", "orders.id")
        .select((eb) => eb.fn.count<number>("orders.id").distinct().as("count"))
        .where("order_lines.shop_id", "=", shopId)
        .where("orders.status", "not in", CLOSED_STATUSES)
        .executeTakeFirstOrThrow();
      return Number(count);
    },
  };
}
