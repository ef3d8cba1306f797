import * as cheerio from "cheerio";
import { FailureKind, QuoteResult } from "../types";
import { extractDigitsWithSeparator } from "../pricing/normalize";
import { errorMessage, fetchPage } from "../scraping/utils";
import { Adapter, StaticSite, failure, quoted } from "./types";

export type HtmlFetcher = (url: string) => Promise<string>;

/** Pick the sale price when the page shows original + discounted, else the only one */
export function pickCandidate<T>(candidates: T[], preferSecond: boolean): T | undefined {
  if (preferSecond && candidates.length > 1) return candidates[1];
  return candidates[0];
}

/**
 * Pull the price text for `site` out of a product page.
 * Exported separately from the adapter so markup can be tested offline.
 */
export function extractStaticQuote(html: string, site: StaticSite): QuoteResult {
  const $ = cheerio.load(html);
  const scope = site.container ? $(site.container) : $.root();

  if (scope.length === 0) {
    return failure(FailureKind.ELEMENT_NOT_FOUND, site.id, `container ${site.container} missing`);
  }

  if (site.stock) {
    const marker = scope.find(site.stock.selector).first();
    if (marker.length > 0) {
      const value = site.stock.attribute
        ? (marker.attr(site.stock.attribute) ?? "").trim()
        : marker.text().trim();
      if (site.stock.values.includes(value)) {
        return failure(FailureKind.OUT_OF_STOCK, site.id);
      }
    }
  }

  const texts = scope
    .find(site.priceSelector)
    .map((_, el) => $(el).text().trim())
    .get();

  const picked = pickCandidate(texts, site.preferSecond ?? false);
  if (!picked) {
    return failure(FailureKind.ELEMENT_NOT_FOUND, site.id, `no match for ${site.priceSelector}`);
  }

  return quoted(site.id, site.digitsOnly ? extractDigitsWithSeparator(picked) : picked);
}

export class StaticPageAdapter implements Adapter {
  readonly type = "static";
  readonly usesSession = false;

  constructor(
    private readonly site: StaticSite,
    private readonly fetchHtml: HtmlFetcher = (url) => fetchPage(url)
  ) {}

  get siteId(): string {
    return this.site.id;
  }

  async fetch(url: string): Promise<QuoteResult> {
    let html: string;
    try {
      html = await this.fetchHtml(url);
    } catch (error) {
      console.warn(`[static] ${this.site.id} fetch failed for ${url}: ${errorMessage(error)}`);
      return failure(FailureKind.TRANSPORT_ERROR, this.site.id, errorMessage(error));
    }

    const result = extractStaticQuote(html, this.site);
    if (!result.ok) {
      console.log(`[static] ${this.site.id}: ${result.failure.kind} (${url})`);
    }
    return result;
  }
}
