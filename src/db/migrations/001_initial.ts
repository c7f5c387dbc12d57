import { Kysely, sql } from "kysely";

// Migrations are written against an untyped handle: the schema they create
// is what `DB` later describes.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("users")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("username", "varchar(150)", (col) => col.notNull().unique())
    .addColumn("email", "varchar(254)", (col) => col.notNull())
    .addColumn("first_name", "varchar(150)", (col) => col.notNull().defaultTo(""))
    .addColumn("last_name", "varchar(150)", (col) => col.notNull().defaultTo(""))
    .addColumn("role", "varchar(10)", (col) =>
      col.notNull().defaultTo("buyer").check(sql`role in ('buyer', 'supplier')`)
    )
    .addColumn("company", "varchar(100)", (col) => col.notNull().defaultTo(""))
    .addColumn("position", "varchar(100)", (col) => col.notNull().defaultTo(""))
    .addColumn("is_staff", "boolean", (col) => col.notNull().defaultTo(false))
    .execute();

  await db.schema
    .createTable("shops")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("name", "varchar(100)", (col) => col.notNull().unique())
    .addColumn("url", "varchar(500)", (col) => col.notNull().defaultTo(""))
    .addColumn("user_id", "integer", (col) =>
      col.unique().references("users.id").onDelete("cascade")
    )
    .addColumn("is_active", "boolean", (col) => col.notNull().defaultTo(true))
    .execute();

  await db.schema
    .createTable("categories")
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("name", "varchar(100)", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("category_shops")
    .addColumn("category_id", "integer", (col) =>
      col.notNull().references("categories.id").onDelete("cascade")
    )
    .addColumn("shop_id", "integer", (col) =>
      col.notNull().references("shops.id").onDelete("cascade")
    )
    .addPrimaryKeyConstraint("category_shops_pkey", ["category_id", "shop_id"])
    .execute();

  await db.schema
    .createTable("products")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("name", "varchar(200)", (col) => col.notNull())
    .addColumn("category_id", "integer", (col) =>
      col.notNull().references("categories.id").onDelete("cascade")
    )
    .addUniqueConstraint("products_name_category_unique", ["name", "category_id"])
    .execute();

  await db.schema
    .createTable("listings")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("product_id", "integer", (col) =>
      col.notNull().references("products.id").onDelete("cascade")
    )
    .addColumn("shop_id", "integer", (col) =>
      col.notNull().references("shops.id").onDelete("cascade")
    )
    .addColumn("external_id", "integer", (col) => col.notNull())
    .addColumn("model", "varchar(80)", (col) => col.notNull().defaultTo(""))
    .addColumn("quantity", "integer", (col) => col.notNull().check(sql`quantity >= 0`))
    .addColumn("price", "numeric(10, 2)", (col) => col.notNull())
    .addColumn("price_rrc", "numeric(10, 2)", (col) => col.notNull())
    .addUniqueConstraint("listings_product_shop_unique", ["product_id", "shop_id"])
    .execute();

  await db.schema
    .createIndex("listings_shop_id_idx")
    .on("listings")
    .column("shop_id")
    .execute();

  await db.schema
    .createTable("parameters")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("name", "varchar(100)", (col) => col.notNull().unique())
    .execute();

  await db.schema
    .createTable("listing_parameters")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("listing_id", "integer", (col) =>
      col.notNull().references("listings.id").onDelete("cascade")
    )
    .addColumn("parameter_id", "integer", (col) =>
      col.notNull().references("parameters.id").onDelete("cascade")
    )
    .addColumn("value", "varchar(100)", (col) => col.notNull())
    .addUniqueConstraint("listing_parameters_unique", ["listing_id", "parameter_id"])
    .execute();

  await db.schema
    .createTable("contacts")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("user_id", "integer", (col) =>
      col.notNull().references("users.id").onDelete("cascade")
    )
    .addColumn("city", "varchar(100)", (col) => col.notNull())
    .addColumn("street", "varchar(200)", (col) => col.notNull())
    .addColumn("house", "varchar(100)", (col) => col.notNull())
    .addColumn("structure", "varchar(10)", (col) => col.notNull().defaultTo(""))
    .addColumn("building", "varchar(10)", (col) => col.notNull().defaultTo(""))
    .addColumn("apartment", "varchar(10)", (col) => col.notNull().defaultTo(""))
    .addColumn("phone", "varchar(20)", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("carts")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("user_id", "integer", (col) =>
      col.notNull().unique().references("users.id").onDelete("cascade")
    )
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable("cart_lines")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("cart_id", "integer", (col) =>
      col.notNull().references("carts.id").onDelete("cascade")
    )
    .addColumn("listing_id", "integer", (col) =>
      col.notNull().references("listings.id").onDelete("cascade")
    )
    .addColumn("quantity", "integer", (col) => col.notNull().check(sql`quantity > 0`))
    .addUniqueConstraint("cart_lines_cart_listing_unique", ["cart_id", "listing_id"])
    .execute();

  await db.schema
    .createTable("orders")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("user_id", "integer", (col) =>
      col.notNull().references("users.id").onDelete("cascade")
    )
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn("status", "varchar(20)", (col) =>
      col
        .notNull()
        .check(
          sql`status in ('new', 'confirmed', 'assembled', 'sent', 'delivered', 'canceled')`
        )
    )
    .addColumn("contact_id", "integer", (col) =>
      col.references("contacts.id").onDelete("set null")
    )
    .execute();

  await db.schema
    .createTable("order_lines")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("order_id", "integer", (col) =>
      col.notNull().references("orders.id").onDelete("cascade")
    )
    .addColumn("listing_id", "integer", (col) =>
      col.references("listings.id").onDelete("set null")
    )
    .addColumn("shop_id", "integer", (col) =>
      col.notNull().references("shops.id").onDelete("cascade")
    )
    .addColumn("product_name", "varchar(200)", (col) => col.notNull())
    .addColumn("model", "varchar(80)", (col) => col.notNull())
    .addColumn("price", "numeric(10, 2)", (col) => col.notNull())
    .addColumn("quantity", "integer", (col) => col.notNull().check(sql`quantity > 0`))
    .addColumn("parameters", "jsonb", (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addUniqueConstraint("order_lines_order_listing_unique", ["order_id", "listing_id"])
    .execute();

  await db.schema
    .createIndex("order_lines_shop_id_idx")
    .on("order_lines")
    .column("shop_id")
    .execute();

  await db.schema
    .createTable("jobs")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("type", "varchar(50)", (col) => col.notNull())
    .addColumn("payload", "jsonb", (col) => col.notNull())
    .addColumn("status", "varchar(10)", (col) => col.notNull().defaultTo("pending"))
    .addColumn("attempts", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("max_retries", "integer", (col) => col.notNull())
    .addColumn("backoff_ms", "integer", (col) => col.notNull())
    .addColumn("result", "jsonb")
    .addColumn("error", "text")
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  for (const table of [
    "jobs",
    "order_lines",
    "orders",
    "cart_lines",
    "carts",
    "contacts",
    "listing_parameters",
    "parameters",
    "listings",
    "products",
    "category_shops",
    "categories",
    "shops",
    "users",
  ]) {
    await db.schema.dropTable(table).ifExists().execute();
  }
}
