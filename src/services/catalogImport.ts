import { Repositories, Store } from "../repositories/types";
import { FeedDocument, FeedGoods } from "../validations/feed";
import {
  AppError,
  ConflictError,
  ImportFailedError,
  errorMessage,
} from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("catalog-import");

export interface ImportTarget {
  shopName: string;
  ownerUserId?: number | null;
}

export interface ImportResult {
  shopId: number;
  shopName: string;
  shopCreated: boolean;
  categoriesTouched: number;
  productsCreated: number;
  listingsDeleted: number;
  listingsWritten: number;
  parametersWritten: number;
}

/**
 * Replaces the shop's whole catalog with the feed's goods. Runs in a single
 * transaction: on any failure the previous listings are left untouched.
 */
export async function importCatalog(
  store: Store,
  feed: FeedDocument,
  target: ImportTarget
): Promise<ImportResult> {
  try {
    const result = await store.transaction((repos) =>
      writeCatalog(repos, feed, target)
    );
    logger.info(result, `Imported catalog for ${result.shopName}`);
    return result;
  } catch (error) {
    logger.error(
      { shopName: target.shopName, error: errorMessage(error) },
      "Catalog import rolled back"
    );
    if (error instanceof AppError) {
      throw error;
    }
    throw new ImportFailedError(errorMessage(error));
  }
}

// Lists and mappings are stored as JSON text.
export function parameterText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

async function writeCatalog(
  repos: Repositories,
  feed: FeedDocument,
  { shopName, ownerUserId = null }: ImportTarget
): Promise<ImportResult> {
  let shop = await repos.shops.findByName(shopName);
  let shopCreated = false;

  if (!shop) {
    shop = await repos.shops.create({ name: shopName, userId: ownerUserId });
    shopCreated = true;
  } else if (
    ownerUserId !== null &&
    shop.userId !== null &&
    shop.userId !== ownerUserId
  ) {
    throw new ConflictError(`Shop "${shopName}" belongs to another supplier`);
  }

  // Feed category ids are used as primary keys as-is: two suppliers using
  // the same id share one category.
  const feedCategoryIds = new Set<number>();
  for (const category of feed.categories) {
    const existing = await repos.categories.findById(category.id);
    if (!existing) {
      await repos.categories.create(category);
    }
    await repos.categories.linkShop(category.id, shop.id);
    feedCategoryIds.add(category.id);
  }

  const listingsDeleted = await repos.listings.deleteByShop(shop.id);

  // One listing per (product, shop): a later goods entry for the same
  // product replaces the earlier one.
  const entries = new Map<number, FeedGoods>();
  let productsCreated = 0;

  for (const item of feed.goods) {
    if (
      !feedCategoryIds.has(item.category) &&
      !(await repos.categories.findById(item.category))
    ) {
      throw new ImportFailedError(
        `goods entry ${item.id} references unknown category ${item.category}`
      );
    }

    let product = await repos.products.findByNameAndCategory(item.name, item.category);
    if (!product) {
      product = await repos.products.create({ name: item.name, categoryId: item.category });
      productsCreated++;
    }
    entries.delete(product.id);
    entries.set(product.id, item);
  }

  let parametersWritten = 0;
  for (const [productId, item] of entries) {
    const listing = await repos.listings.create({
      productId,
      shopId: shop.id,
      externalId: item.id,
      model: item.model,
      quantity: item.quantity,
      price: item.price,
      priceRrc: item.price_rrc,
    });

    for (const [name, value] of Object.entries(item.parameters)) {
      const parameter = await repos.parameters.findOrCreate(name);
      await repos.parameters.setValue(
        listing.id,
        parameter.id,
        parameterText(value)
      );
      parametersWritten++;
    }
  }

  return {
    shopId: shop.id,
    shopName: shop.name,
    shopCreated,
    categoriesTouched: feedCategoryIds.size,
    productsCreated,
    listingsDeleted,
    listingsWritten: entries.size,
    parametersWritten,
  };
}
