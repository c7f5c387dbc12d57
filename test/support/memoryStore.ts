import {
  CartRepo,
  CategoryRepo,
  ContactRepo,
  JobRepo,
  ListingRepo,
  OrderRepo,
  ParameterRepo,
  ProductRepo,
  Repositories,
  ShopRepo,
  Store,
  UserRepo,
} from "../../src/repositories/types";
import {
  Cart,
  CartLine,
  Category,
  Contact,
  Job,
  Listing,
  ListingDetail,
  Order,
  OrderLine,
  OrderStatus,
  Parameter,
  Product,
  Shop,
  User,
} from "../../src/types/models";

interface Tables {
  seq: Record<string, number>;
  users: User[];
  shops: Shop[];
  categories: Category[];
  categoryShops: { categoryId: number; shopId: number }[];
  products: Product[];
  listings: Listing[];
  parameters: Parameter[];
  listingParameters: { listingId: number; parameterId: number; value: string }[];
  contacts: Contact[];
  carts: Cart[];
  cartLines: CartLine[];
  orders: Order[];
  orderLines: OrderLine[];
  jobs: Job[];
}

const emptyTables = (): Tables => ({
  seq: {},
  users: [],
  shops: [],
  categories: [],
  categoryShops: [],
  products: [],
  listings: [],
  parameters: [],
  listingParameters: [],
  contacts: [],
  carts: [],
  cartLines: [],
  orders: [],
  orderLines: [],
  jobs: [],
});

const CLOSED: OrderStatus[] = ["delivered", "canceled"];

function uniqueViolation(constraint: string) {
  return Object.assign(
    new Error(`duplicate key value violates unique constraint "${constraint}"`),
    { code: "23505" }
  );
}

const copy = <T extends object>(row: T): T => ({ ...row });

/**
 * Repository implementations over plain arrays, with the constraints and
 * cascades of the SQL schema. Transactions run one at a time and restore a
 * snapshot when the work throws.
 */
export class MemoryStore implements Store {
  private state: Tables = emptyTables();
  private lock: Promise<void> = Promise.resolve();

  readonly users: UserRepo;
  readonly shops: ShopRepo;
  readonly categories: CategoryRepo;
  readonly products: ProductRepo;
  readonly listings: ListingRepo;
  readonly parameters: ParameterRepo;
  readonly contacts: ContactRepo;
  readonly carts: CartRepo;
  readonly orders: OrderRepo;
  readonly jobs: JobRepo;

  constructor() {
    this.users = this.userRepo();
    this.shops = this.shopRepo();
    this.categories = this.categoryRepo();
    this.products = this.productRepo();
    this.listings = this.listingRepo();
    this.parameters = this.parameterRepo();
    this.contacts = this.contactRepo();
    this.carts = this.cartRepo();
    this.orders = this.orderRepo();
    this.jobs = this.jobRepo();
  }

  get tables(): Readonly<Tables> {
    return this.state;
  }

  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const run = this.lock.then(async () => {
      const snapshot = structuredClone(this.state);
      try {
        return await work(this);
      } catch (err) {
        this.state = snapshot;
        throw err;
      }
    });
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  seedUser(fields: Partial<User> & Pick<User, "username">): User {
    const user: User = {
      id: this.nextId("users"),
      email: `${fields.username}@example.com`,
      firstName: "",
      lastName: "",
      role: "buyer",
      company: "",
      position: "",
      isStaff: false,
      ...fields,
    };
    this.state.users.push(user);
    return copy(user);
  }

  private nextId(table: string) {
    const id = (this.state.seq[table] ?? 0) + 1;
    this.state.seq[table] = id;
    return id;
  }

  private userRepo(): UserRepo {
    return {
      findById: async (id) => {
        const user = this.state.users.find((row) => row.id === id);
        return user && copy(user);
      },
      findByIds: async (ids) =>
        this.state.users.filter((row) => ids.includes(row.id)).map(copy),
    };
  }

  private shopRepo(): ShopRepo {
    return {
      findById: async (id) => {
        const shop = this.state.shops.find((row) => row.id === id);
        return shop && copy(shop);
      },
      findByName: async (name) => {
        const shop = this.state.shops.find((row) => row.name === name);
        return shop && copy(shop);
      },
      findByOwner: async (userId) => {
        const shop = this.state.shops.find((row) => row.userId === userId);
        return shop && copy(shop);
      },
      create: async ({ name, url = "", userId = null }) => {
        if (this.state.shops.some((row) => row.name === name)) {
          throw uniqueViolation("shops_name_key");
        }
        if (userId !== null && this.state.shops.some((row) => row.userId === userId)) {
          throw uniqueViolation("shops_user_id_key");
        }
        const shop: Shop = { id: this.nextId("shops"), name, url, userId, isActive: true };
        this.state.shops.push(shop);
        return copy(shop);
      },
      listActive: async () =>
        this.state.shops
          .filter((row) => row.isActive)
          .sort((a, b) => b.name.localeCompare(a.name))
          .map(copy),
      setActive: async (id, isActive) => {
        for (const shop of this.state.shops) {
          if (shop.id === id) {
            shop.isActive = isActive;
          }
        }
      },
    };
  }

  private categoryRepo(): CategoryRepo {
    return {
      findById: async (id) => {
        const category = this.state.categories.find((row) => row.id === id);
        return category && copy(category);
      },
      create: async (category) => {
        const existing = this.state.categories.find((row) => row.id === category.id);
        if (existing) {
          return copy(existing);
        }
        this.state.categories.push(copy(category));
        return copy(category);
      },
      linkShop: async (categoryId, shopId) => {
        const linked = this.state.categoryShops.some(
          (row) => row.categoryId === categoryId && row.shopId === shopId
        );
        if (!linked) {
          this.state.categoryShops.push({ categoryId, shopId });
        }
      },
      list: async () =>
        [...this.state.categories].sort((a, b) => b.name.localeCompare(a.name)).map(copy),
    };
  }

  private productRepo(): ProductRepo {
    const find = (name: string, categoryId: number) =>
      this.state.products.find((row) => row.name === name && row.categoryId === categoryId);

    return {
      findByNameAndCategory: async (name, categoryId) => {
        const product = find(name, categoryId);
        return product && copy(product);
      },
      create: async ({ name, categoryId }) => {
        const existing = find(name, categoryId);
        if (existing) {
          return copy(existing);
        }
        const product: Product = { id: this.nextId("products"), name, categoryId };
        this.state.products.push(product);
        return copy(product);
      },
    };
  }

  private detail(listing: Listing): ListingDetail | undefined {
    const product = this.state.products.find((row) => row.id === listing.productId);
    const category = product && this.state.categories.find((row) => row.id === product.categoryId);
    const shop = this.state.shops.find((row) => row.id === listing.shopId);
    if (!product || !category || !shop) {
      return undefined;
    }
    const parameters = this.state.listingParameters
      .filter((row) => row.listingId === listing.id)
      .map((row) => ({
        name: this.state.parameters.find((parameter) => parameter.id === row.parameterId)?.name ?? "",
        value: row.value,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));

    return {
      ...listing,
      product: { id: product.id, name: product.name, category: copy(category) },
      shop: copy(shop),
      parameters,
    };
  }

  private details(listings: Listing[]): ListingDetail[] {
    const result: ListingDetail[] = [];
    for (const listing of [...listings].sort((a, b) => a.id - b.id)) {
      const detail = this.detail(listing);
      if (detail) {
        result.push(detail);
      }
    }
    return result;
  }

  private listingRepo(): ListingRepo {
    return {
      deleteByShop: async (shopId) => {
        const removed = new Set(
          this.state.listings.filter((row) => row.shopId === shopId).map((row) => row.id)
        );
        this.state.listings = this.state.listings.filter((row) => !removed.has(row.id));
        this.state.listingParameters = this.state.listingParameters.filter(
          (row) => !removed.has(row.listingId)
        );
        this.state.cartLines = this.state.cartLines.filter(
          (row) => !removed.has(row.listingId)
        );
        for (const line of this.state.orderLines) {
          if (line.listingId !== null && removed.has(line.listingId)) {
            line.listingId = null;
          }
        }
        return removed.size;
      },
      create: async (input) => {
        const taken = this.state.listings.some(
          (row) => row.productId === input.productId && row.shopId === input.shopId
        );
        if (taken) {
          throw uniqueViolation("listings_product_id_shop_id_key");
        }
        const listing: Listing = { id: this.nextId("listings"), ...input };
        this.state.listings.push(listing);
        return copy(listing);
      },
      findDetail: async (id) => {
        const listing = this.state.listings.find((row) => row.id === id);
        return listing && this.detail(listing);
      },
      findDetails: async (ids) =>
        this.details(this.state.listings.filter((row) => ids.includes(row.id))),
      search: async (filter) =>
        this.details(this.state.listings).filter(
          (row) =>
            (filter.shopId === undefined || row.shopId === filter.shopId) &&
            (filter.categoryId === undefined || row.product.category.id === filter.categoryId) &&
            (!filter.inStockOnly || row.quantity > 0) &&
            (!filter.activeShopsOnly || row.shop.isActive)
        ),
      countByShop: async (shopId, { inStockOnly = false } = {}) =>
        this.state.listings.filter(
          (row) => row.shopId === shopId && (!inStockOnly || row.quantity > 0)
        ).length,
    };
  }

  private parameterRepo(): ParameterRepo {
    return {
      findOrCreate: async (name) => {
        const existing = this.state.parameters.find((row) => row.name === name);
        if (existing) {
          return copy(existing);
        }
        const parameter: Parameter = { id: this.nextId("parameters"), name };
        this.state.parameters.push(parameter);
        return copy(parameter);
      },
      setValue: async (listingId, parameterId, value) => {
        const existing = this.state.listingParameters.find(
          (row) => row.listingId === listingId && row.parameterId === parameterId
        );
        if (existing) {
          existing.value = value;
        } else {
          this.state.listingParameters.push({ listingId, parameterId, value });
        }
      },
    };
  }

  private contactRepo(): ContactRepo {
    return {
      listByUser: async (userId) =>
        this.state.contacts
          .filter((row) => row.userId === userId)
          .sort((a, b) => a.id - b.id)
          .map(copy),
      findById: async (id) => {
        const contact = this.state.contacts.find((row) => row.id === id);
        return contact && copy(contact);
      },
      create: async (input) => {
        const contact: Contact = { id: this.nextId("contacts"), ...input };
        this.state.contacts.push(contact);
        return copy(contact);
      },
      delete: async (id, userId) => {
        const before = this.state.contacts.length;
        this.state.contacts = this.state.contacts.filter(
          (row) => !(row.id === id && row.userId === userId)
        );
        if (this.state.contacts.length === before) {
          return false;
        }
        for (const order of this.state.orders) {
          if (order.contactId === id) {
            order.contactId = null;
          }
        }
        return true;
      },
    };
  }

  private cartRepo(): CartRepo {
    return {
      findByUser: async (userId) => {
        const cart = this.state.carts.find((row) => row.userId === userId);
        return cart && copy(cart);
      },
      getOrCreate: async (userId) => {
        let cart = this.state.carts.find((row) => row.userId === userId);
        if (!cart) {
          cart = { id: this.nextId("carts"), userId, createdAt: new Date() };
          this.state.carts.push(cart);
        }
        return copy(cart);
      },
      addLine: async (cartId, listingId, quantity) => {
        const existing = this.state.cartLines.find(
          (row) => row.cartId === cartId && row.listingId === listingId
        );
        if (existing) {
          existing.quantity += quantity;
          return copy(existing);
        }
        const line: CartLine = { id: this.nextId("cartLines"), cartId, listingId, quantity };
        this.state.cartLines.push(line);
        return copy(line);
      },
      updateLineQuantity: async (cartId, lineId, quantity) => {
        const line = this.state.cartLines.find(
          (row) => row.id === lineId && row.cartId === cartId
        );
        if (!line) {
          return false;
        }
        line.quantity = quantity;
        return true;
      },
      removeLines: async (cartId, lineIds) => {
        const before = this.state.cartLines.length;
        this.state.cartLines = this.state.cartLines.filter(
          (row) => !(row.cartId === cartId && lineIds.includes(row.id))
        );
        return before - this.state.cartLines.length;
      },
      listLines: async (cartId) =>
        this.state.cartLines
          .filter((row) => row.cartId === cartId)
          .sort((a, b) => a.id - b.id)
          .map(copy),
      delete: async (cartId) => {
        this.state.carts = this.state.carts.filter((row) => row.id !== cartId);
        this.state.cartLines = this.state.cartLines.filter((row) => row.cartId !== cartId);
      },
    };
  }

  private orderRepo(): OrderRepo {
    const newestFirst = (a: Order, b: Order) =>
      b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;

    return {
      create: async ({ userId, status, contactId }) => {
        const order: Order = {
          id: this.nextId("orders"),
          userId,
          createdAt: new Date(),
          status,
          contactId,
        };
        this.state.orders.push(order);
        return copy(order);
      },
      addLines: async (orderId, lines) => {
        for (const line of lines) {
          const duplicate =
            line.listingId !== null &&
            this.state.orderLines.some(
              (row) => row.orderId === orderId && row.listingId === line.listingId
            );
          if (duplicate) {
            throw uniqueViolation("order_lines_order_id_listing_id_key");
          }
          this.state.orderLines.push({
            id: this.nextId("orderLines"),
            orderId,
            ...line,
            parameters: line.parameters.map(copy),
          });
        }
      },
      findById: async (id) => {
        const order = this.state.orders.find((row) => row.id === id);
        return order && copy(order);
      },
      listByUser: async (userId) =>
        this.state.orders.filter((row) => row.userId === userId).sort(newestFirst).map(copy),
      listContainingShop: async (shopId) =>
        this.state.orders
          .filter((order) =>
            this.state.orderLines.some(
              (line) => line.orderId === order.id && line.shopId === shopId
            )
          )
          .sort(newestFirst)
          .map(copy),
      listLines: async (orderIds, { shopId } = {}) =>
        this.state.orderLines
          .filter(
            (row) =>
              orderIds.includes(row.orderId) && (shopId === undefined || row.shopId === shopId)
          )
          .sort((a, b) => a.id - b.id)
          .map((row) => ({ ...row, parameters: row.parameters.map(copy) })),
      updateStatus: async (id, status) => {
        for (const order of this.state.orders) {
          if (order.id === id) {
            order.status = status;
          }
        }
      },
      countOpenForShop: async (shopId) =>
        this.state.orders.filter(
          (order) =>
            !CLOSED.includes(order.status) &&
            this.state.orderLines.some(
              (line) => line.orderId === order.id && line.shopId === shopId
            )
        ).length,
    };
  }

  private jobRepo(): JobRepo {
    const update = (id: string, fields: Partial<Job>) => {
      for (const job of this.state.jobs) {
        if (job.id === id) {
          Object.assign(job, fields, { updatedAt: new Date() });
        }
      }
    };

    return {
      create: async ({ id, type, payload, maxRetries, backoffMs }) => {
        const now = new Date();
        const job: Job = {
          id,
          type,
          payload: structuredClone(payload),
          status: "pending",
          attempts: 0,
          maxRetries,
          backoffMs,
          result: null,
          error: null,
          createdAt: now,
          updatedAt: now,
        };
        this.state.jobs.push(job);
        return copy(job);
      },
      findById: async (id) => {
        const job = this.state.jobs.find((row) => row.id === id);
        return job && copy(job);
      },
      recordAttempt: async (id, attempts) => update(id, { attempts }),
      markSuccess: async (id, attempts, result) =>
        update(id, {
          status: "success",
          attempts,
          // Stored as JSON, so Dates come back as strings.
          result: JSON.parse(JSON.stringify(result ?? null)),
          error: null,
        }),
      markFailure: async (id, attempts, error) =>
        update(id, { status: "failure", attempts, error }),
    };
  }
}
