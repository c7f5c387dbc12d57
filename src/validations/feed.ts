import { z } from "zod";

// YAML feeds sometimes quote numbers ("19.99"); accept those, but leave a
// missing value undefined so it is reported as missing rather than NaN.
const numeric = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim() !== "" ? Number(value) : value,
  z.number({ invalid_type_error: "Expected a number" }).finite()
);

const text = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z.string().trim()
);

export const ZFeedCategory = z.object({
  id: numeric.pipe(z.number().int()),
  name: text.pipe(z.string().min(1)),
});

export const ZFeedGoods = z.object({
  id: numeric.pipe(z.number().int()),
  name: text.pipe(z.string().min(1)),
  category: numeric.pipe(z.number().int()),
  model: text,
  price: numeric.pipe(z.number().nonnegative()),
  price_rrc: numeric.pipe(z.number().nonnegative()),
  quantity: numeric.pipe(z.number().int().nonnegative()),
  parameters: z.record(z.unknown()).default({}),
});

export const ZFeedDocument = z.object({
  shop: text.optional(),
  categories: ZFeedCategory.array(),
  goods: ZFeedGoods.array(),
});

export type FeedCategory = z.infer<typeof ZFeedCategory>;
export type FeedGoods = z.infer<typeof ZFeedGoods>;
export type FeedDocument = z.infer<typeof ZFeedDocument>;
