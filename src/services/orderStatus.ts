import { OrderStatus } from "../types/models";
import { ValidationError } from "../utils/errors";

export const ORDER_STATUSES = [
  "new",
  "confirmed",
  "assembled",
  "sent",
  "delivered",
  "canceled",
] as const satisfies readonly OrderStatus[];

export type TransitionPolicy = "permissive" | "sequential";

const NEXT_STATUS: Record<OrderStatus, readonly OrderStatus[]> = {
  new: ["confirmed", "canceled"],
  confirmed: ["assembled", "canceled"],
  assembled: ["sent", "canceled"],
  sent: ["delivered", "canceled"],
  delivered: [],
  canceled: [],
};

/**
 * `permissive` accepts any status from any state, as orders always have;
 * `sequential` only walks the pipeline forward or cancels an open order.
 */
export function assertTransition(
  from: OrderStatus,
  to: OrderStatus,
  policy: TransitionPolicy
) {
  if (policy === "permissive") {
    return;
  }
  if (!NEXT_STATUS[from].includes(to)) {
    throw new ValidationError(`Cannot change order status from ${from} to ${to}`);
  }
}
