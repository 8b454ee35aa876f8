/**
 * Shopify REST Admin API response shapes (the fields the client reads).
 *
 * @module shopify/schemas
 */

import { z } from "zod";

const ShopifyId = z.union([z.number().int(), z.string().min(1)]).transform(String);

export const ShopifyVariantSchema = z.object({
  id: ShopifyId,
  title: z.string().nullish(),
  sku: z.string().nullish(),
  barcode: z.string().nullish(),
  inventory_item_id: ShopifyId,
  inventory_quantity: z.number().nullish(),
});

export const ShopifyProductSchema = z.object({
  id: ShopifyId,
  title: z.string(),
  variants: z.array(ShopifyVariantSchema).default([]),
});

export const ProductsPageSchema = z.object({
  products: z.array(ShopifyProductSchema),
});

export const ShopifyLocationSchema = z.object({
  id: ShopifyId,
  name: z.string().nullish(),
  active: z.boolean().nullish(),
  legacy: z.boolean().nullish(),
});

export const LocationsResponseSchema = z.object({
  locations: z.array(ShopifyLocationSchema),
});

export type ShopifyVariant = z.infer<typeof ShopifyVariantSchema>;
export type ShopifyProduct = z.infer<typeof ShopifyProductSchema>;
export type ShopifyLocation = z.infer<typeof ShopifyLocationSchema>;
