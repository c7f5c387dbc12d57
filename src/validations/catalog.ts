import { z } from "zod";
import { ZId } from "./common";

export const ZListingQuery = z.object({
  shop_id: ZId.optional(),
  category_id: ZId.optional(),
});
