import { z } from "zod";
import { ZId } from "./common";

export const ZImportRequestSchema = z.object({
  url: z.string().trim().min(1),
  shop_name: z.string().trim().min(1).max(50).optional(),
});

export const ZStaffImportSchema = z.object({
  shop_id: ZId,
  import_url: z.string().trim().min(1),
});

export const ZShopStateSchema = z.object({
  is_active: z.boolean(),
});

export type ImportRequest = z.infer<typeof ZImportRequestSchema>;
export type StaffImportRequest = z.infer<typeof ZStaffImportSchema>;
export type ShopStateRequest = z.infer<typeof ZShopStateSchema>;
