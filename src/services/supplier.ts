import { AppContext } from "../context";
import { catalogImportJob, queueOrderEmail } from "../queue/jobs";
import { JobHandle } from "../queue/types";
import { Repositories, Store } from "../repositories/types";
import { Contact, Order, OrderLine, OrderStatus, Shop, User } from "../types/models";
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../utils/errors";
import { createLogger } from "../utils/logger";
import { lineTotal, sumTotals } from "../utils/money";
import { assertFeedUrl } from "./feedLoader";
import { assertTransition } from "./orderStatus";

const logger = createLogger("supplier");

export interface SupplierOrderSummary {
  id: number;
  createdAt: Date;
  status: OrderStatus;
  buyer: string;
  totalAmount: number;
  itemsCount: number;
  contact: { city: string; phone: string } | null;
}

export interface SupplierOrderDetail {
  id: number;
  createdAt: Date;
  status: OrderStatus;
  buyer: {
    username: string;
    email: string;
    firstName: string;
    lastName: string;
    company: string;
  } | null;
  contact: Contact | null;
  items: {
    id: number;
    productName: string;
    model: string;
    quantity: number;
    price: number;
    total: number;
    parameters: OrderLine["parameters"];
  }[];
  totalAmount: number;
}

function assertSupplier(user: User) {
  if (user.role !== "supplier") {
    throw new ForbiddenError("Only suppliers can access this resource");
  }
}

export async function requireSupplierShop(repos: Repositories, user: User): Promise<Shop> {
  assertSupplier(user);
  const shop = await repos.shops.findByOwner(user.id);
  if (!shop) {
    throw new NotFoundError("Shop not found for this supplier");
  }
  return shop;
}

async function contactsById(store: Store, orders: Order[]) {
  const contacts = new Map<number, Contact>();
  for (const order of orders) {
    if (order.contactId !== null && !contacts.has(order.contactId)) {
      const contact = await store.contacts.findById(order.contactId);
      if (contact) {
        contacts.set(contact.id, contact);
      }
    }
  }
  return contacts;
}

/** Orders holding at least one line of the supplier's shop, newest first. */
export async function listSupplierOrders(
  { store }: AppContext,
  user: User
): Promise<SupplierOrderSummary[]> {
  const shop = await requireSupplierShop(store, user);
  const orders = await store.orders.listContainingShop(shop.id);
  const lines = await store.orders.listLines(
    orders.map((order) => order.id),
    { shopId: shop.id }
  );
  const buyers = await store.users.findByIds([...new Set(orders.map((order) => order.userId))]);
  const buyerById = new Map(buyers.map((buyer) => [buyer.id, buyer]));
  const contacts = await contactsById(store, orders);

  return orders.map((order) => {
    const own = lines.filter((line) => line.orderId === order.id);
    const contact = order.contactId === null ? undefined : contacts.get(order.contactId);
    return {
      id: order.id,
      createdAt: order.createdAt,
      status: order.status,
      buyer: buyerById.get(order.userId)?.username ?? "",
      totalAmount: sumTotals(own),
      itemsCount: own.length,
      contact: contact ? { city: contact.city, phone: contact.phone } : null,
    };
  });
}

async function findShopOrder(repos: Repositories, shop: Shop, orderId: number) {
  const order = await repos.orders.findById(orderId);
  const lines = order ? await repos.orders.listLines([order.id], { shopId: shop.id }) : [];
  if (!order || lines.length === 0) {
    throw new NotFoundError("Order not found");
  }
  return { order, lines };
}

export async function getSupplierOrder(
  { store }: AppContext,
  user: User,
  orderId: number
): Promise<SupplierOrderDetail> {
  const shop = await requireSupplierShop(store, user);
  const { order, lines } = await findShopOrder(store, shop, orderId);
  const buyer = await store.users.findById(order.userId);
  const contact = order.contactId === null ? undefined : await store.contacts.findById(order.contactId);

  return {
    id: order.id,
    createdAt: order.createdAt,
    status: order.status,
    buyer: buyer
      ? {
          username: buyer.username,
          email: buyer.email,
          firstName: buyer.firstName,
          lastName: buyer.lastName,
          company: buyer.company,
        }
      : null,
    contact: contact ?? null,
    items: lines.map((line) => ({
      id: line.id,
      productName: line.productName,
      model: line.model,
      quantity: line.quantity,
      price: line.price,
      total: lineTotal(line),
      parameters: line.parameters,
    })),
    totalAmount: sumTotals(lines),
  };
}

/**
 * Changes the status of an order holding the shop's goods and notifies the
 * buyer by email.
 */
export async function updateSupplierOrderStatus(
  { store, queue, settings }: AppContext,
  user: User,
  orderId: number,
  status: OrderStatus
): Promise<Order> {
  const { order, lines } = await store.transaction(async (repos) => {
    const shop = await requireSupplierShop(repos, user);
    const found = await findShopOrder(repos, shop, orderId);
    assertTransition(found.order.status, status, settings.transitions);
    await repos.orders.updateStatus(found.order.id, status);
    return { order: { ...found.order, status }, lines: found.lines };
  });

  const buyer = await store.users.findById(order.userId);
  if (buyer) {
    await queueOrderEmail(
      queue,
      {
        to: buyer.email,
        template: "order-status",
        context: {
          orderId: order.id,
          username: buyer.username,
          status,
          total: sumTotals(lines),
          items: [],
        },
      },
      settings
    );
  }

  logger.info({ orderId, status, supplierId: user.id }, "Order status updated");
  return order;
}

export async function getShopState({ store }: AppContext, user: User) {
  const shop = await requireSupplierShop(store, user);
  const [activeListings, totalListings, activeOrders] = await Promise.all([
    store.listings.countByShop(shop.id, { inStockOnly: true }),
    store.listings.countByShop(shop.id),
    store.orders.countOpenForShop(shop.id),
  ]);

  return {
    shopName: shop.name,
    isActive: shop.isActive,
    statistics: { activeListings, activeOrders, totalListings },
  };
}

export async function setShopActive({ store }: AppContext, user: User, isActive: boolean) {
  const shop = await requireSupplierShop(store, user);
  await store.shops.setActive(shop.id, isActive);
  logger.info({ shopId: shop.id, isActive }, "Shop state changed");
  return { shopName: shop.name, isActive };
}

/**
 * Queues a catalog import for the supplier's shop. A supplier without a shop
 * names the one the import will create.
 */
export async function requestImport(
  { store, queue, settings }: AppContext,
  user: User,
  input: { url: string; shopName?: string }
): Promise<JobHandle> {
  assertSupplier(user);
  const url = assertFeedUrl(input.url).href;

  let shopName: string;
  const shop = await store.shops.findByOwner(user.id);
  if (shop) {
    shopName = shop.name;
  } else {
    if (!input.shopName) {
      throw new ValidationError("shop_name is required for the first import", {
        shop_name: ["Required"],
      });
    }
    if (await store.shops.findByName(input.shopName)) {
      throw new ConflictError(`Shop "${input.shopName}" already exists`);
    }
    shopName = input.shopName;
  }

  const handle = await queue.enqueue(
    catalogImportJob({ url, shopName, ownerUserId: user.id }, settings)
  );
  logger.info({ jobId: handle.id, shopName }, "Catalog import queued");
  return handle;
}

export async function requestImportAsStaff(
  { store, queue, settings }: AppContext,
  user: User,
  input: { shopId: number; url: string }
): Promise<JobHandle> {
  if (!user.isStaff) {
    throw new ForbiddenError("Only staff can import catalogs for other shops");
  }
  const url = assertFeedUrl(input.url).href;
  const shop = await store.shops.findById(input.shopId);
  if (!shop) {
    throw new NotFoundError("Shop not found");
  }

  return queue.enqueue(
    catalogImportJob({ url, shopName: shop.name, ownerUserId: shop.userId }, settings)
  );
}
