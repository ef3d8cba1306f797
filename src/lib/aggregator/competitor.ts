import { z } from "zod";

export const productCardSchema = z.object({
  shop_id: z.union([z.number(), z.string()]),
  raw_price: z.number().default(0),
  products: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
});

export const filterProductsSchema = z.object({
  shop_count: z.number().int().nonnegative().default(0),
  product_cards: z.record(productCardSchema).default({}),
});

export type FilterProductsPayload = z.infer<typeof filterProductsSchema>;

export interface ShopOffer {
  price: number;
  shopId: string;
  shopName: string;
}

export function offersFromPayload(payload: FilterProductsPayload): ShopOffer[] {
  return Object.values(payload.product_cards).map((card) => ({
    price: card.raw_price,
    shopId: String(card.shop_id),
    shopName: card.products?.[0]?.name ?? "",
  }));
}

/**
 * The offer we compete against. When our own shop is already the cheapest
 * that is the runner-up, otherwise the cheapest offer. Null when no other
 * shop sells the product.
 */
export function pickReferenceOffer(offers: ShopOffer[], ownShopId: string): ShopOffer | null {
  const sorted = [...offers].sort((a, b) => a.price - b.price);
  if (sorted.length === 0) return null;

  if (sorted.filter((o) => o.shopId === ownShopId).length > 1) {
    console.warn(`[aggregator] Own shop ${ownShopId} listed on more than one card; reference price is unreliable`);
  }

  if (sorted[0].shopId === ownShopId) {
    return sorted.length > 1 ? sorted[1] : null;
  }
  return sorted[0];
}
