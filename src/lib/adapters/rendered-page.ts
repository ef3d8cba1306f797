import { FailureKind, QuoteResult } from "../types";
import { PageState, RenderingSession, SessionFatalError } from "../scraping/browser";
import { errorMessage } from "../scraping/utils";
import { pickCandidate } from "./static-page";
import { Adapter, RenderedSite, failure, quoted } from "./types";

/**
 * Rendered price blocks put the original price and the sale price on
 * separate lines; the sale price is the second one when both are shown.
 */
export function pickPriceLine(text: string): string {
  const lines = text.split("\n");
  return (lines.length > 1 ? lines[1] : lines[0]).trim();
}

export async function extractRenderedQuote(page: PageState, site: RenderedSite): Promise<QuoteResult> {
  if (await page.hasElement(site.notFoundSelector)) {
    return failure(FailureKind.ELEMENT_NOT_FOUND, site.id, "not-found page");
  }

  const texts = await page.innerTexts(site.priceSelector);
  const picked = pickCandidate(texts, true);
  if (picked === undefined) {
    return failure(FailureKind.ELEMENT_NOT_FOUND, site.id, `no match for ${site.priceSelector}`);
  }

  const line = pickPriceLine(picked);
  if (!line) {
    return failure(FailureKind.ELEMENT_NOT_FOUND, site.id, "empty price element");
  }
  return quoted(site.id, line);
}

export class RenderedPageAdapter implements Adapter {
  readonly type = "rendered";
  readonly usesSession = true;

  constructor(
    private readonly site: RenderedSite,
    private readonly session: RenderingSession
  ) {}

  get siteId(): string {
    return this.site.id;
  }

  async fetch(url: string): Promise<QuoteResult> {
    try {
      const result = await this.session.navigate(url, (page) => extractRenderedQuote(page, this.site));
      if (!result.ok) {
        console.log(`[browser] ${this.site.id}: ${result.failure.kind} (${url})`);
      }
      return result;
    } catch (error) {
      if (error instanceof SessionFatalError) throw error;
      console.warn(`[browser] ${this.site.id} navigation failed for ${url}: ${errorMessage(error)}`);
      return failure(FailureKind.TRANSPORT_ERROR, this.site.id, errorMessage(error));
    }
  }
}
