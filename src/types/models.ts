import { JobStatus, OrderStatus, ParameterValue, UserRole } from "./db";

export type { JobStatus, OrderStatus, ParameterValue, UserRole };

export interface User {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  company: string;
  position: string;
  isStaff: boolean;
}

export interface Shop {
  id: number;
  name: string;
  url: string;
  userId: number | null;
  isActive: boolean;
}

export interface Category {
  id: number;
  name: string;
}

export interface Product {
  id: number;
  name: string;
  categoryId: number;
}

export interface Parameter {
  id: number;
  name: string;
}

export interface Listing {
  id: number;
  productId: number;
  shopId: number;
  externalId: number;
  model: string;
  quantity: number;
  price: number;
  priceRrc: number;
}

export interface ListingDetail extends Listing {
  product: { id: number; name: string; category: Category };
  shop: Shop;
  parameters: ParameterValue[];
}

export interface ListingFilter {
  shopId?: number;
  categoryId?: number;
  inStockOnly?: boolean;
  activeShopsOnly?: boolean;
}

export interface Contact {
  id: number;
  userId: number;
  city: string;
  street: string;
  house: string;
  structure: string;
  building: string;
  apartment: string;
  phone: string;
}

export type NewContact = Omit<Contact, "id">;

export interface Cart {
  id: number;
  userId: number;
  createdAt: Date;
}

export interface CartLine {
  id: number;
  cartId: number;
  listingId: number;
  quantity: number;
}

export interface Order {
  id: number;
  userId: number;
  createdAt: Date;
  status: OrderStatus;
  contactId: number | null;
}

export interface OrderLine {
  id: number;
  orderId: number;
  listingId: number | null;
  shopId: number;
  productName: string;
  model: string;
  price: number;
  quantity: number;
  parameters: ParameterValue[];
}

export type NewOrderLine = Omit<OrderLine, "id" | "orderId">;

export interface Job {
  id: string;
  type: string;
  payload: unknown;
  status: JobStatus;
  attempts: number;
  maxRetries: number;
  backoffMs: number;
  result: unknown;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}
