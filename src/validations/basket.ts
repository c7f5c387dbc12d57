import { z } from "zod";
import { ZId } from "./common";

export const ZAddItemSchema = z.object({
  listing_id: ZId,
  quantity: z.number().int().positive().default(1),
});

export const ZUpdateLinesSchema = z.object({
  items: z
    .object({
      id: ZId,
      quantity: z.number().int().positive(),
    })
    .array()
    .min(1),
});

export const ZRemoveLinesSchema = z.object({
  items: ZId.array().min(1),
});

export type AddItemRequest = z.infer<typeof ZAddItemSchema>;
export type UpdateLinesRequest = z.infer<typeof ZUpdateLinesSchema>;
export type RemoveLinesRequest = z.infer<typeof ZRemoveLinesSchema>;
