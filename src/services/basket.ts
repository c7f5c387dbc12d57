import { Store } from "../repositories/types";
import { ListingDetail } from "../types/models";
import { NotFoundError, ValidationError } from "../utils/errors";
import { lineTotal, sumTotals } from "../utils/money";

export interface BasketLineView {
  id: number;
  quantity: number;
  total: number;
  listing: ListingDetail;
}

export interface BasketView {
  id: number | null;
  lines: BasketLineView[];
  total: number;
}

export async function getBasket(store: Store, userId: number): Promise<BasketView> {
  const cart = await store.carts.findByUser(userId);
  if (!cart) {
    return { id: null, lines: [], total: 0 };
  }

  const lines = await store.carts.listLines(cart.id);
  const listings = await store.listings.findDetails(lines.map((line) => line.listingId));
  const byId = new Map(listings.map((listing) => [listing.id, listing]));

  const views: BasketLineView[] = [];
  for (const line of lines) {
    const listing = byId.get(line.listingId);
    if (!listing) {
      continue;
    }
    views.push({
      id: line.id,
      quantity: line.quantity,
      total: lineTotal({ quantity: line.quantity, price: listing.price }),
      listing,
    });
  }

  return {
    id: cart.id,
    lines: views,
    total: sumTotals(views.map((view) => ({ quantity: view.quantity, price: view.listing.price }))),
  };
}

/**
 * Adds `quantity` of a listing to the user's basket, creating the basket on
 * first use. Adding a listing already in the basket increases its quantity.
 */
export async function addItem(
  store: Store,
  userId: number,
  listingId: number,
  quantity: number
) {
  const listing = await store.listings.findDetail(listingId);
  if (!listing) {
    throw new NotFoundError("Product not found");
  }
  if (!listing.shop.isActive) {
    throw new ValidationError(`Shop "${listing.shop.name}" is not accepting orders`);
  }

  return store.transaction(async (repos) => {
    const cart = await repos.carts.getOrCreate(userId);
    return repos.carts.addLine(cart.id, listingId, quantity);
  });
}

/** Lines that are not in the user's basket are skipped. */
export async function updateLines(
  store: Store,
  userId: number,
  items: { id: number; quantity: number }[]
) {
  const cart = await store.carts.findByUser(userId);
  if (!cart) {
    return 0;
  }

  return store.transaction(async (repos) => {
    let updated = 0;
    for (const item of items) {
      if (await repos.carts.updateLineQuantity(cart.id, item.id, item.quantity)) {
        updated++;
      }
    }
    return updated;
  });
}

export async function removeLines(store: Store, userId: number, lineIds: number[]) {
  const cart = await store.carts.findByUser(userId);
  if (!cart) {
    return 0;
  }
  return store.carts.removeLines(cart.id, lineIds);
}
