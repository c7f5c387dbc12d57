import { z } from "zod";

const field = (max: number) => z.string().trim().max(max);

export const ZContactSchema = z.object({
  city: field(50).min(1),
  street: field(100).min(1),
  house: field(15).default(""),
  structure: field(15).default(""),
  building: field(15).default(""),
  apartment: field(15).default(""),
  phone: field(20).min(1),
});

export type ContactRequest = z.infer<typeof ZContactSchema>;
