import { FailureKind, QuoteResult } from "../types";

/** Out-of-stock marker: an element whose text (or attribute) equals one of `values` */
export interface StockMarker {
  selector: string;
  attribute?: string;
  values: string[];
}

/** Product page readable from the server-rendered HTML */
export interface StaticSite {
  id: string;
  domain: string;
  container?: string;
  stock?: StockMarker;
  priceSelector: string;
  /** Sale-price convention: a second price element (the discounted one) wins */
  preferSecond?: boolean;
  digitsOnly?: boolean;
}

/** Product page whose price only exists after client-side rendering */
export interface RenderedSite {
  id: string;
  domain: string;
  notFoundSelector: string;
  priceSelector: string;
}

export interface AggregatorSite {
  id: string;
  domain: string;
}

export type SiteRule =
  | { type: "static"; site: StaticSite }
  | { type: "rendered"; site: RenderedSite }
  | { type: "aggregator"; site: AggregatorSite };

export type AdapterKind = SiteRule | { type: "unknown" };

/** Uniform extraction contract: one URL in, one QuoteResult out */
export interface Adapter {
  readonly type: AdapterKind["type"];
  readonly siteId: string | null;
  /** Whether a fetch through this adapter counts as a rendering-session use */
  readonly usesSession: boolean;
  fetch(url: string): Promise<QuoteResult>;
}

export function failure(kind: FailureKind, siteId: string | null, details?: string): QuoteResult {
  return { ok: false, failure: { kind, siteId, details } };
}

export function quoted(
  sourceId: string,
  rawPriceText: string | null,
  extra: { storeCount?: number; aggregatorReferencePrice?: string | null } = {}
): QuoteResult {
  return {
    ok: true,
    quote: Object.freeze({
      sourceId,
      rawPriceText,
      storeCount: extra.storeCount ?? 0,
      aggregatorReferencePrice: extra.aggregatorReferencePrice ?? null,
    }),
  };
}
