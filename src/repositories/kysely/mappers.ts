import { Selectable } from "kysely";
import {
  CartLinesTable,
  CartsTable,
  ContactsTable,
  JobsTable,
  ListingsTable,
  OrderLinesTable,
  OrdersTable,
  ShopsTable,
  UsersTable,
} from "../../types/db";
import {
  Cart,
  CartLine,
  Contact,
  Job,
  Listing,
  Order,
  OrderLine,
  Shop,
  User,
} from "../../types/models";

export const toUser = (row: Selectable<UsersTable>): User => ({
  id: row.id,
  username: row.username,
  email: row.email,
  firstName: row.first_name,
  lastName: row.last_name,
  role: row.role,
  company: row.company,
  position: row.position,
  isStaff: row.is_staff,
});

export const toShop = (row: Selectable<ShopsTable>): Shop => ({
  id: row.id,
  name: row.name,
  url: row.url,
  userId: row.user_id,
  isActive: row.is_active,
});

export const toListing = (row: Selectable<ListingsTable>): Listing => ({
  id: row.id,
  productId: row.product_id,
  shopId: row.shop_id,
  externalId: row.external_id,
  model: row.model,
  quantity: row.quantity,
  price: row.price,
  priceRrc: row.price_rrc,
});

export const toContact = (row: Selectable<ContactsTable>): Contact => ({
  id: row.id,
  userId: row.user_id,
  city: row.city,
  street: row.street,
  house: row.house,
  structure: row.structure,
  building: row.building,
  apartment: row.apartment,
  phone: row.phone,
});

export const toCart = (row: Selectable<CartsTable>): Cart => ({
  id: row.id,
  userId: row.user_id,
  createdAt: row.created_at,
});

export const toCartLine = (row: Selectable<CartLinesTable>): CartLine => ({
  id: row.id,
  cartId: row.cart_id,
  listingId: row.listing_id,
  quantity: row.quantity,
});

export const toOrder = (row: Selectable<OrdersTable>): Order => ({
  id: row.id,
  userId: row.user_id,
  createdAt: row.created_at,
  status: row.status,
  contactId: row.contact_id,
});

export const toOrderLine = (row: Selectable<OrderLinesTable>): OrderLine => ({
  id: row.id,
  orderId: row.order_id,
  listingId: row.listing_id,
  shopId: row.shop_id,
  productName: row.product_name,
  model: row.model,
  price: row.price,
  quantity: row.quantity,
  parameters: row.parameters,
});

export const toJob = (row: Selectable<JobsTable>): Job => ({
  id: row.id,
  type: row.type,
  payload: row.payload,
  status: row.status,
  attempts: row.attempts,
  maxRetries: row.max_retries,
  backoffMs: row.backoff_ms,
  result: row.result,
  error: row.error,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});
