import { beforeEach, describe, expect, it, vi } from "vitest";
import { addItem } from "../../src/services/basket";
import { importCatalog } from "../../src/services/catalogImport";
import { checkout } from "../../src/services/order";
import { User } from "../../src/types/models";
import { listListings, listShops } from "../../src/services/products";
import {
  getShopState,
  getSupplierOrder,
  listSupplierOrders,
  requestImport,
  requestImportAsStaff,
  setShopActive,
  updateSupplierOrderStatus,
} from "../../src/services/supplier";
import {
  ConflictError,
  ForbiddenError,
  InvalidSourceError,
  NotFoundError,
  ValidationError,
} from "../../src/utils/errors";
import {
  TestContext,
  createTestContext,
  readFixture,
  seedMarketplace,
} from "../support/context";

describe("supplier order view", () => {
  let ctx: TestContext;
  let seed: Awaited<ReturnType<typeof seedMarketplace>>;
  let globexOwner: User;

  beforeEach(async () => {
    ctx = createTestContext();
    seed = await seedMarketplace(ctx);
    globexOwner = ctx.store.seedUser({ username: "globex-owner", role: "supplier" });
    const globex = await importCatalog(ctx.store, readFixture("globex.yaml"), {
      shopName: "Globex",
      ownerUserId: globexOwner.id,
    });
    const [g1] = await ctx.store.listings.search({ shopId: globex.shopId });

    await addItem(ctx.store, seed.buyer.id, seed.x1.id, 2);
    await addItem(ctx.store, seed.buyer.id, g1.id, 1);
    await checkout(ctx, seed.buyer, seed.contact.id);
  });

  it("lists orders with only the shop's lines counted", async () => {
    const acme = await listSupplierOrders(ctx, seed.supplier);
    const globex = await listSupplierOrders(ctx, globexOwner);

    expect(acme).toEqual([
      {
        id: 1,
        createdAt: expect.any(Date),
        status: "new",
        buyer: "alice",
        totalAmount: 200,
        itemsCount: 1,
        contact: { city: "Springfield", phone: "+10000000000" },
      },
    ]);
    expect(globex[0]).toMatchObject({ id: 1, totalAmount: 250, itemsCount: 1 });
  });

  it("shows the buyer, the contact and the shop's lines of one order", async () => {
    const order = await getSupplierOrder(ctx, seed.supplier, 1);

    expect(order.buyer).toEqual({
      username: "alice",
      email: "alice@example.com",
      firstName: "Alice",
      lastName: "Buyer",
      company: "Alice & Co",
    });
    expect(order.contact).toMatchObject({ city: "Springfield", apartment: "5" });
    expect(order.items).toEqual([
      {
        id: 1,
        productName: "X1",
        model: "X1-2024",
        quantity: 2,
        price: 100,
        total: 200,
        parameters: [
          { name: "color", value: "black" },
          { name: "memory (GB)", value: "128" },
        ],
      },
    ]);
    expect(order.totalAmount).toBe(200);
  });

  it("hides orders without the shop's goods", async () => {
    const g1 = ctx.store.tables.listings.find((row) => row.model === "G-Phone");
    await addItem(ctx.store, seed.buyer.id, g1?.id ?? 0, 1);
    const onlyGlobex = await checkout(ctx, seed.buyer, seed.contact.id);

    await expect(getSupplierOrder(ctx, seed.supplier, onlyGlobex.id)).rejects.toThrow(
      NotFoundError
    );
    expect((await listSupplierOrders(ctx, seed.supplier)).map((order) => order.id)).toEqual([1]);
  });

  it("is only for suppliers that own a shop", async () => {
    await expect(listSupplierOrders(ctx, seed.buyer)).rejects.toThrow(ForbiddenError);

    const newcomer = ctx.store.seedUser({ username: "newcomer", role: "supplier" });
    await expect(listSupplierOrders(ctx, newcomer)).rejects.toThrow(
      "Shop not found for this supplier"
    );
  });

  it("updates the status and notifies the buyer", async () => {
    const order = await updateSupplierOrderStatus(ctx, seed.supplier, 1, "assembled");
    await ctx.queue.drain();

    expect(order.status).toBe("assembled");
    expect(ctx.sent).toEqual([
      {
        to: "alice@example.com",
        subject: "Order #1 is now assembled",
        text: 'Hello, alice!\n\nThe status of your order #1 changed to "assembled".',
      },
    ]);
  });

  it("applies the transition policy to supplier updates", async () => {
    ctx.settings.transitions = "sequential";

    await expect(updateSupplierOrderStatus(ctx, seed.supplier, 1, "delivered")).rejects.toThrow(
      ValidationError
    );
    expect(ctx.sent).toEqual([]);
  });

  it("keeps the new status when the buyer email cannot be queued", async () => {
    vi.spyOn(ctx.queue, "enqueue").mockRejectedValue(new Error("broker down"));

    const order = await updateSupplierOrderStatus(ctx, seed.supplier, 1, "sent");

    expect(order.status).toBe("sent");
    expect((await getSupplierOrder(ctx, seed.supplier, 1)).status).toBe("sent");
    expect(ctx.sent).toEqual([]);
  });
});

describe("shop state", () => {
  let ctx: TestContext;
  let seed: Awaited<ReturnType<typeof seedMarketplace>>;

  beforeEach(async () => {
    ctx = createTestContext();
    seed = await seedMarketplace(ctx);
  });

  it("reports listings and open orders", async () => {
    await addItem(ctx.store, seed.buyer.id, seed.x1.id, 1);
    await checkout(ctx, seed.buyer, seed.contact.id);

    expect(await getShopState(ctx, seed.supplier)).toEqual({
      shopName: "Acme",
      isActive: true,
      statistics: { activeListings: 2, activeOrders: 1, totalListings: 3 },
    });

    await updateSupplierOrderStatus(ctx, seed.supplier, 1, "delivered");
    expect((await getShopState(ctx, seed.supplier)).statistics.activeOrders).toBe(0);
  });

  it("hides a deactivated shop from buyers", async () => {
    expect(await setShopActive(ctx, seed.supplier, false)).toEqual({
      shopName: "Acme",
      isActive: false,
    });

    expect(await listShops(ctx.store)).toEqual([]);
    expect(await listListings(ctx.store)).toEqual([]);
  });
});

describe("catalog import requests", () => {
  let ctx: TestContext;
  let seed: Awaited<ReturnType<typeof seedMarketplace>>;

  beforeEach(async () => {
    ctx = createTestContext();
    seed = await seedMarketplace(ctx);
  });

  it("imports into the supplier's shop in the background", async () => {
    const handle = await requestImport(ctx, seed.supplier, {
      url: "https://feeds.example.com/acme.yaml",
    });
    await ctx.queue.drain();

    expect(ctx.feedRequests).toEqual(["https://feeds.example.com/acme.yaml"]);
    expect(await ctx.queue.poll(handle.id)).toMatchObject({
      type: "catalog-import",
      status: "success",
      attempts: 1,
      result: { shopName: "Acme", shopCreated: false, listingsDeleted: 3, listingsWritten: 3 },
    });
  });

  it("creates a named shop for a supplier without one", async () => {
    const newcomer = ctx.store.seedUser({ username: "initech-owner", role: "supplier" });

    await expect(
      requestImport(ctx, newcomer, { url: "https://feeds.example.com/globex.yaml" })
    ).rejects.toThrow(ValidationError);
    await expect(
      requestImport(ctx, newcomer, { url: "https://feeds.example.com/globex.yaml", shopName: "Acme" })
    ).rejects.toThrow(ConflictError);

    await requestImport(ctx, newcomer, {
      url: "https://feeds.example.com/globex.yaml",
      shopName: "Initech",
    });
    await ctx.queue.drain();

    expect(await ctx.store.shops.findByOwner(newcomer.id)).toMatchObject({ name: "Initech" });
  });

  it("rejects feed URLs that are not http(s)", async () => {
    await expect(
      requestImport(ctx, seed.supplier, { url: "ftp://feeds.example.com/acme.yaml" })
    ).rejects.toThrow(InvalidSourceError);
    expect(ctx.store.tables.jobs).toEqual([]);
  });

  it("rejects buyers", async () => {
    await expect(
      requestImport(ctx, seed.buyer, { url: "https://feeds.example.com/acme.yaml" })
    ).rejects.toThrow(ForbiddenError);
  });

  it("gives up after the last retry and keeps the error", async () => {
    const handle = await requestImport(ctx, seed.supplier, {
      url: "https://feeds.example.com/missing.yaml",
    });
    await ctx.queue.drain();

    const state = await ctx.queue.poll(handle.id);
    expect(state).toMatchObject({ status: "failure", attempts: 4 });
    expect(state?.error).toMatch(/^ENOENT/);
    expect(ctx.feedRequests).toHaveLength(4);
  });

  it("lets staff import for any shop", async () => {
    const staff = ctx.store.seedUser({ username: "admin", isStaff: true });

    await expect(
      requestImportAsStaff(ctx, seed.buyer, { shopId: seed.shopId, url: "https://feeds.example.com/acme.yaml" })
    ).rejects.toThrow(ForbiddenError);
    await expect(
      requestImportAsStaff(ctx, staff, { shopId: 99, url: "https://feeds.example.com/acme.yaml" })
    ).rejects.toThrow("Shop not found");

    const handle = await requestImportAsStaff(ctx, staff, {
      shopId: seed.shopId,
      url: "https://feeds.example.com/acme.yaml",
    });
    await ctx.queue.drain();

    expect(ctx.store.tables.jobs[0].payload).toEqual({
      url: "https://feeds.example.com/acme.yaml",
      shopName: "Acme",
      ownerUserId: seed.supplier.id,
    });
    expect((await ctx.queue.poll(handle.id))?.status).toBe("success");
  });
});
