import { Store } from "../repositories/types";
import { NotFoundError } from "../utils/errors";

export async function listShops(store: Store) {
  return store.shops.listActive();
}

export async function listCategories(store: Store) {
  return store.categories.list();
}

/** Listings buyers can order right now: in stock, from shops taking orders. */
export async function listListings(
  store: Store,
  filter: { shopId?: number; categoryId?: number } = {}
) {
  return store.listings.search({
    ...filter,
    inStockOnly: true,
    activeShopsOnly: true,
  });
}

export async function getListing(store: Store, listingId: number) {
  const listing = await store.listings.findDetail(listingId);
  if (!listing) {
    throw new NotFoundError("Product not found");
  }
  return listing;
}
