import {
  Cart,
  CartLine,
  Category,
  Contact,
  Job,
  Listing,
  ListingDetail,
  ListingFilter,
  NewContact,
  NewOrderLine,
  Order,
  OrderLine,
  OrderStatus,
  Parameter,
  Product,
  Shop,
  User,
} from "../types/models";

export interface UserRepo {
  findById(id: number): Promise<User | undefined>;
  findByIds(ids: number[]): Promise<User[]>;
}

export interface ShopRepo {
  findById(id: number): Promise<Shop | undefined>;
  findByName(name: string): Promise<Shop | undefined>;
  findByOwner(userId: number): Promise<Shop | undefined>;
  create(input: { name: string; url?: string; userId?: number | null }): Promise<Shop>;
  listActive(): Promise<Shop[]>;
  setActive(id: number, isActive: boolean): Promise<void>;
}

export interface CategoryRepo {
  findById(id: number): Promise<Category | undefined>;
  create(category: Category): Promise<Category>;
  /** Idempotent. */
  linkShop(categoryId: number, shopId: number): Promise<void>;
  list(): Promise<Category[]>;
}

export interface ProductRepo {
  findByNameAndCategory(name: string, categoryId: number): Promise<Product | undefined>;
  create(input: { name: string; categoryId: number }): Promise<Product>;
}

export interface ListingRepo {
  /** Removes every listing of the shop with its parameters; returns the count. */
  deleteByShop(shopId: number): Promise<number>;
  create(input: Omit<Listing, "id">): Promise<Listing>;
  findDetail(id: number): Promise<ListingDetail | undefined>;
  findDetails(ids: number[]): Promise<ListingDetail[]>;
  search(filter: ListingFilter): Promise<ListingDetail[]>;
  countByShop(shopId: number, options?: { inStockOnly?: boolean }): Promise<number>;
}

export interface ParameterRepo {
  findOrCreate(name: string): Promise<Parameter>;
  setValue(listingId: number, parameterId: number, value: string): Promise<void>;
}

export interface ContactRepo {
  listByUser(userId: number): Promise<Contact[]>;
  findById(id: number): Promise<Contact | undefined>;
  create(input: NewContact): Promise<Contact>;
  delete(id: number, userId: number): Promise<boolean>;
}

export interface CartRepo {
  /** `forUpdate` locks the cart row until the surrounding transaction ends. */
  findByUser(userId: number, options?: { forUpdate?: boolean }): Promise<Cart | undefined>;
  getOrCreate(userId: number): Promise<Cart>;
  /** Inserts the line or atomically adds `quantity` to the existing one. */
  addLine(cartId: number, listingId: number, quantity: number): Promise<CartLine>;
  updateLineQuantity(cartId: number, lineId: number, quantity: number): Promise<boolean>;
  removeLines(cartId: number, lineIds: number[]): Promise<number>;
  listLines(cartId: number): Promise<CartLine[]>;
  delete(cartId: number): Promise<void>;
}

export interface OrderRepo {
  create(input: { userId: number; status: OrderStatus; contactId: number | null }): Promise<Order>;
  addLines(orderId: number, lines: NewOrderLine[]): Promise<void>;
  findById(id: number): Promise<Order | undefined>;
  /** Newest first. */
  listByUser(userId: number): Promise<Order[]>;
  /** Orders with at least one line of the shop, newest first. */
  listContainingShop(shopId: number): Promise<Order[]>;
  listLines(orderIds: number[], options?: { shopId?: number }): Promise<OrderLine[]>;
  updateStatus(id: number, status: OrderStatus): Promise<void>;
  countOpenForShop(shopId: number): Promise<number>;
}

export interface JobRepo {
  create(input: {
    id: string;
    type: string;
    payload: unknown;
    maxRetries: number;
    backoffMs: number;
  }): Promise<Job>;
  findById(id: string): Promise<Job | undefined>;
  recordAttempt(id: string, attempts: number): Promise<void>;
  markSuccess(id: string, attempts: number, result: unknown): Promise<void>;
  markFailure(id: string, attempts: number, error: string): Promise<void>;
}

export interface Repositories {
  users: UserRepo;
  shops: ShopRepo;
  categories: CategoryRepo;
  products: ProductRepo;
  listings: ListingRepo;
  parameters: ParameterRepo;
  contacts: ContactRepo;
  carts: CartRepo;
  orders: OrderRepo;
  jobs: JobRepo;
}

/**
 * Entry point to persistence. Reads go through the repositories directly;
 * writes spanning several entities go through `transaction`, which commits
 * when `work` resolves and rolls everything back when it throws.
 */
export interface Store extends Repositories {
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
