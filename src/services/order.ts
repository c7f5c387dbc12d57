import { AppContext } from "../context";
import { queueOrderEmail } from "../queue/jobs";
import { JobHandle } from "../queue/types";
import { Repositories } from "../repositories/types";
import { Order, OrderLine, OrderStatus, User } from "../types/models";
import { NotFoundError, ValidationError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { lineTotal, sumTotals } from "../utils/money";
import { assertTransition } from "./orderStatus";

const logger = createLogger("orders");

export interface OrderLineView {
  id: number;
  listingId: number | null;
  shopId: number;
  productName: string;
  model: string;
  price: number;
  quantity: number;
  total: number;
  parameters: OrderLine["parameters"];
}

export interface OrderView extends Order {
  total: number;
  lines: OrderLineView[];
}

const toLineView = (line: OrderLine): OrderLineView => ({
  id: line.id,
  listingId: line.listingId,
  shopId: line.shopId,
  productName: line.productName,
  model: line.model,
  price: line.price,
  quantity: line.quantity,
  total: lineTotal(line),
  parameters: line.parameters,
});

async function withLines(repos: Repositories, orders: Order[]): Promise<OrderView[]> {
  const lines = await repos.orders.listLines(orders.map((order) => order.id));
  return orders.map((order) => {
    const own = lines.filter((line) => line.orderId === order.id);
    return { ...order, total: sumTotals(own), lines: own.map(toLineView) };
  });
}

/**
 * Turns the user's basket into a `new` order. The order lines copy the
 * listing's name, model, price and parameters, so later imports do not
 * rewrite past orders.
 */
export async function checkout(
  { store }: AppContext,
  user: User,
  contactId: number
): Promise<OrderView> {
  const order = await store.transaction(async (repos) => {
    const cart = await repos.carts.findByUser(user.id, { forUpdate: true });
    const lines = cart ? await repos.carts.listLines(cart.id) : [];
    if (!cart || lines.length === 0) {
      throw new ValidationError("Basket is empty");
    }

    const contact = await repos.contacts.findById(contactId);
    if (!contact || contact.userId !== user.id) {
      throw new NotFoundError("Contact not found");
    }

    const listings = await repos.listings.findDetails(lines.map((line) => line.listingId));
    const byId = new Map(listings.map((listing) => [listing.id, listing]));

    const orderLines = lines.map((line) => {
      const listing = byId.get(line.listingId);
      if (!listing) {
        throw new ValidationError(`Product ${line.listingId} is no longer available`);
      }
      if (!listing.shop.isActive) {
        throw new ValidationError(`Shop "${listing.shop.name}" is not accepting orders`);
      }
      return {
        listingId: listing.id,
        shopId: listing.shopId,
        productName: listing.product.name,
        model: listing.model,
        price: listing.price,
        quantity: line.quantity,
        parameters: listing.parameters,
      };
    });

    const created = await repos.orders.create({
      userId: user.id,
      status: "new",
      contactId: contact.id,
    });
    await repos.orders.addLines(created.id, orderLines);
    await repos.carts.delete(cart.id);

    return created;
  });

  logger.info({ orderId: order.id, userId: user.id }, "Order placed");
  const [view] = await withLines(store, [order]);
  return view;
}

export async function listOrders({ store }: AppContext, user: User) {
  const orders = await store.orders.listByUser(user.id);
  return withLines(store, orders);
}

async function findOwnOrder(repos: Repositories, user: User, orderId: number) {
  const order = await repos.orders.findById(orderId);
  if (!order || order.userId !== user.id) {
    throw new NotFoundError("Order not found");
  }
  return order;
}

export async function getOrder({ store }: AppContext, user: User, orderId: number) {
  const order = await findOwnOrder(store, user, orderId);
  const [view] = await withLines(store, [order]);
  return view;
}

export async function updateOrderStatus(
  { store, settings }: AppContext,
  user: User,
  orderId: number,
  status: OrderStatus
): Promise<Order> {
  return store.transaction(async (repos) => {
    const order = await findOwnOrder(repos, user, orderId);
    assertTransition(order.status, status, settings.transitions);
    await repos.orders.updateStatus(order.id, status);
    return { ...order, status };
  });
}

/**
 * Confirms the order and queues the confirmation email to the buyer. Resolves
 * to `null` when the order was confirmed but the email could not be queued.
 */
export async function confirmOrder(
  ctx: AppContext,
  user: User,
  orderId: number
): Promise<JobHandle | null> {
  await updateOrderStatus(ctx, user, orderId, "confirmed");
  const order = await getOrder(ctx, user, orderId);

  return queueOrderEmail(
    ctx.queue,
    {
      to: user.email,
      template: "order-confirmed",
      context: {
        orderId: order.id,
        username: user.username,
        status: order.status,
        total: order.total,
        items: order.lines.map((line) => ({
          name: line.productName,
          quantity: line.quantity,
          price: line.price,
        })),
      },
    },
    ctx.settings
  );
}
