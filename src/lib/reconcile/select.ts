import { cleanPrice } from "../pricing/normalize";
import { DiagnosticEntry, Quote, ReconciliationResult } from "../types";

/** Largest value, or null when nothing is above zero */
export function positiveMax(values: number[]): number | null {
  const max = values.length > 0 ? Math.max(...values) : 0;
  return max > 0 ? max : null;
}

/**
 * Pick the canonical result for one SKU.
 *
 * The minimum is taken over quotes with a parseable price only, and ties go
 * to the earliest quote. Store count and aggregator price maxima span every
 * quote, including ones whose own price was missing. Returns null when no
 * quote has a usable price.
 */
export function selectCanonical(
  sku: string,
  quotes: Quote[]
): { result: ReconciliationResult; diagnostic: DiagnosticEntry } | null {
  let minimumPrice: number | null = null;
  let winningSourceId = "";

  for (const quote of quotes) {
    const price = cleanPrice(quote.rawPriceText);
    if (price === null) continue;
    if (minimumPrice === null || price < minimumPrice) {
      minimumPrice = price;
      winningSourceId = quote.sourceId;
    }
  }

  if (minimumPrice === null) return null;

  const storeCounts = quotes.map((q) => (Number.isInteger(q.storeCount) && q.storeCount > 0 ? q.storeCount : 0));
  const aggregatorPrices = quotes.map((q) => cleanPrice(q.aggregatorReferencePrice) ?? 0);

  const result: ReconciliationResult = Object.freeze({
    sku,
    winningSourceId,
    minimumPrice,
    maxStoreCount: positiveMax(storeCounts),
    maxAggregatorPrice: positiveMax(aggregatorPrices),
  });

  return {
    result,
    diagnostic: { sku, minimumPrice, winningSourceId, storeCounts, aggregatorPrices },
  };
}
