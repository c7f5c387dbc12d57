import { ColumnType, Generated } from "kysely";

type CreatedAt = ColumnType<Date, Date | string | undefined, never>;
type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;
type Json<T> = ColumnType<T, string, string>;

export type UserRole = "buyer" | "supplier";

export interface UsersTable {
  id: Generated<number>;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  role: UserRole;
  company: string;
  position: string;
  is_staff: Generated<boolean>;
}

export interface ShopsTable {
  id: Generated<number>;
  name: string;
  url: string;
  user_id: number | null; // Owner, at most one shop per user
  is_active: Generated<boolean>;
}

export interface CategoriesTable {
  id: number; // Supplied by the feed
  name: string;
}

export interface CategoryShopsTable {
  category_id: number;
  shop_id: number;
}

export interface ProductsTable {
  id: Generated<number>;
  name: string;
  category_id: number;
}

export interface ListingsTable {
  id: Generated<number>;
  product_id: number;
  shop_id: number;
  external_id: number; // The goods id from the supplier's feed
  model: string;
  quantity: number;
  price: number;
  price_rrc: number;
}

export interface ParametersTable {
  id: Generated<number>;
  name: string;
}

export interface ListingParametersTable {
  id: Generated<number>;
  listing_id: number;
  parameter_id: number;
  value: string;
}

export interface ContactsTable {
  id: Generated<number>;
  user_id: number;
  city: string;
  street: string;
  house: string;
  structure: string;
  building: string;
  apartment: string;
  phone: string;
}

export interface CartsTable {
  id: Generated<number>;
  user_id: number;
  created_at: CreatedAt;
}

export interface CartLinesTable {
  id: Generated<number>;
  cart_id: number;
  listing_id: number;
  quantity: number;
}

export type OrderStatus =
  | "new"
  | "confirmed"
  | "assembled"
  | "sent"
  | "delivered"
  | "canceled";

export interface OrdersTable {
  id: Generated<number>;
  user_id: number;
  created_at: CreatedAt;
  status: OrderStatus;
  contact_id: number | null;
}

export interface ParameterValue {
  name: string;
  value: string;
}

export interface OrderLinesTable {
  id: Generated<number>;
  order_id: number;
  listing_id: number | null; // Cleared when a later import replaces the listing
  shop_id: number;
  product_name: string;
  model: string;
  price: number;
  quantity: number;
  parameters: Json<ParameterValue[]>;
}

export type JobStatus = "pending" | "success" | "failure";

export interface JobsTable {
  id: string;
  type: string;
  payload: Json<unknown>;
  status: JobStatus;
  attempts: number;
  max_retries: number;
  backoff_ms: number;
  result: ColumnType<unknown, string | null, string | null>;
  error: string | null;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface DB {
  users: UsersTable;
  shops: ShopsTable;
  categories: CategoriesTable;
  category_shops: CategoryShopsTable;
  products: ProductsTable;
  listings: ListingsTable;
  parameters: ParametersTable;
  listing_parameters: ListingParametersTable;
  contacts: ContactsTable;
  carts: CartsTable;
  cart_lines: CartLinesTable;
  orders: OrdersTable;
  order_lines: OrderLinesTable;
  jobs: JobsTable;
}
