import { z } from "zod";
import { ZId } from "./common";

export const ZCheckoutSchema = z.object({
  contact_id: ZId,
});

export type CheckoutRequest = z.infer<typeof ZCheckoutSchema>;
