import { z } from "zod";
import { ORDER_STATUSES } from "../services/orderStatus";

export const ZId = z.coerce.number().int().positive();

export const ZIdParam = z.object({ id: ZId });

export const ZJobIdParam = z.object({ id: z.string().uuid() });

export const ZOrderStatus = z.enum(ORDER_STATUSES);

export const ZStatusUpdate = z.object({ status: ZOrderStatus });

export type StatusUpdate = z.infer<typeof ZStatusUpdate>;
