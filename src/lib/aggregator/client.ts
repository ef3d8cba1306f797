import { fetch as undiciFetch } from "undici";
import { config } from "../config";
import { FailureKind, QuoteResult } from "../types";
import { delay, errorMessage, getProxyDispatcher } from "../scraping/utils";
import { Adapter, failure, quoted } from "../adapters/types";
import { filterProductsSchema, offersFromPayload, pickReferenceOffer } from "./competitor";

export interface AggregatorClientOptions {
  siteId?: string;
  endpoint?: string;
  ownShopId?: string;
  maxAttempts?: number;
  backoffSeconds?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** Product id is the path segment after `/s/`, e.g. https://www.skroutz.gr/s/123/name.html → "123" */
export function extractProductId(url: string): string | null {
  const marker = url.indexOf("/s/");
  if (marker === -1) return null;
  const id = url.slice(marker + 3).split(/[/?#]/)[0];
  return id ? id : null;
}

export function parseRetryAfter(header: string | null, fallbackSeconds: number): number {
  if (header === null || !/^\d+$/.test(header.trim())) return fallbackSeconds;
  return parseInt(header.trim(), 10);
}

/**
 * Client for the marketplace comparison endpoint.
 *
 * Every request counts as an attempt, capped at `maxAttempts`:
 * 403 and transport failures back off for `backoffSeconds`, 429 honours
 * Retry-After, any other non-200 retries straight away.
 */
export class AggregatorClient implements Adapter {
  readonly type = "aggregator";
  readonly usesSession = false;
  readonly siteId: string;

  private readonly endpoint: string;
  private readonly ownShopId: string;
  private readonly maxAttempts: number;
  private readonly backoffSeconds: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: AggregatorClientOptions = {}) {
    this.siteId = options.siteId ?? "skroutz";
    this.endpoint = (options.endpoint ?? config.aggregatorEndpoint).replace(/\/+$/, "");
    this.ownShopId = options.ownShopId ?? config.ownShopId;
    this.maxAttempts = options.maxAttempts ?? config.aggregatorMaxAttempts;
    this.backoffSeconds = options.backoffSeconds ?? config.aggregatorBackoffSeconds;
    this.sleep = options.sleep ?? delay;
  }

  fetch(url: string): Promise<QuoteResult> {
    return this.quote(url);
  }

  async quote(url: string): Promise<QuoteResult> {
    const productId = extractProductId(url);
    if (!productId) {
      console.warn(`[aggregator] No product id in ${url}`);
      return failure(FailureKind.MALFORMED_INPUT, this.siteId, "missing /s/<id> segment");
    }

    const apiUrl = `${this.endpoint}/${productId}/filter_products.json`;
    const dispatcher = getProxyDispatcher();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await undiciFetch(apiUrl, {
          headers: {
            "User-Agent": config.getRandomUserAgent(),
            Accept:
              "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
            "Accept-Language": "en-GB,en;q=0.9",
            Referer: url,
            "Viewport-Width": "1920",
          },
          dispatcher,
        });

        if (response.status === 403) {
          await response.body?.cancel();
          console.warn(`[aggregator] 403 for ${productId} (attempt ${attempt}/${this.maxAttempts}), backing off`);
          await this.sleep(this.backoffSeconds * 1000);
          continue;
        }

        if (response.status === 429) {
          await response.body?.cancel();
          const waitSeconds = parseRetryAfter(response.headers.get("retry-after"), this.backoffSeconds);
          console.warn(`[aggregator] Rate limited for ${productId}, waiting ${waitSeconds}s`);
          await this.sleep(waitSeconds * 1000);
          continue;
        }

        if (response.status !== 200) {
          await response.body?.cancel();
          console.warn(`[aggregator] Unexpected status ${response.status} for ${productId}`);
          continue;
        }

        const payload = filterProductsSchema.parse(await response.json());
        const offers = offersFromPayload(payload);
        const reference = pickReferenceOffer(offers, this.ownShopId);
        const referenceText = reference === null ? null : String(reference.price);
        const chosen =
          reference === null
            ? "no competing offer"
            : `reference ${referenceText} from ${reference.shopName || reference.shopId}`;

        console.log(`[aggregator] ${productId}: ${offers.length} offers, ${payload.shop_count} shops, ${chosen}`);
        return quoted(this.siteId, referenceText, {
          storeCount: payload.shop_count,
          aggregatorReferencePrice: referenceText,
        });
      } catch (error) {
        console.warn(`[aggregator] Attempt ${attempt}/${this.maxAttempts} for ${productId} failed: ${errorMessage(error)}`);
        await this.sleep(this.backoffSeconds * 1000);
      }
    }

    return failure(FailureKind.AGGREGATOR_UNRESOLVED, this.siteId, `gave up after ${this.maxAttempts} attempts`);
  }
}
