import { describe, it, expect, vi } from "vitest";
import { SITE_TABLE } from "../lib/adapters/sites";
import { StaticPageAdapter, extractStaticQuote, pickCandidate } from "../lib/adapters/static-page";
import type { StaticSite } from "../lib/adapters/types";
import { FailureKind } from "../lib/types";

function staticSite(id: string): StaticSite {
  const rule = SITE_TABLE.find((r) => r.site.id === id);
  if (!rule || rule.type !== "static") throw new Error(`no static site ${id}`);
  return rule.site;
}

const WOO_IN_STOCK = `
  <div class="basel-scroll-content">
    <p class="stock in-stock">Σε απόθεμα</p>
    <p class="price">
      <del><span class="woocommerce-Price-amount amount">9,90€</span></del>
      <ins><span class="woocommerce-Price-amount amount">7,50€</span></ins>
    </p>
  </div>`;

describe("pickCandidate", () => {
  it("prefers the second candidate when asked and available", () => {
    expect(pickCandidate(["9,90", "7,50"], true)).toBe("7,50");
    expect(pickCandidate(["9,90"], true)).toBe("9,90");
  });

  it("takes the first candidate otherwise", () => {
    expect(pickCandidate(["9,90", "7,50"], false)).toBe("9,90");
    expect(pickCandidate([], true)).toBeUndefined();
  });
});

describe("extractStaticQuote", () => {
  it("takes the sale price when original and sale are both shown", () => {
    const result = extractStaticQuote(WOO_IN_STOCK, staticSite("glutenfreeyourself.gr"));
    expect(result).toEqual({
      ok: true,
      quote: {
        sourceId: "glutenfreeyourself.gr",
        rawPriceText: "7,50€",
        storeCount: 0,
        aggregatorReferencePrice: null,
      },
    });
  });

  it("takes the only price when there is no sale", () => {
    const html = `<div class="single-product-content"><span class="woocommerce-Price-amount amount">5,40€</span></div>`;
    const result = extractStaticQuote(html, staticSite("biohealthyfood.gr"));
    expect(result.ok && result.quote.rawPriceText).toBe("5,40€");
  });

  it("reports out of stock from the stock label", () => {
    const html = `
      <div class="basel-scroll-content">
        <p class="stock out-of-stock">Εξαντλημένο</p>
        <span class="woocommerce-Price-amount amount">9,90€</span>
      </div>`;
    const result = extractStaticQuote(html, staticSite("glutenfreeyourself.gr"));
    expect(result).toEqual({
      ok: false,
      failure: { kind: FailureKind.OUT_OF_STOCK, siteId: "glutenfreeyourself.gr", details: undefined },
    });
  });

  it("reports out of stock from a schema.org availability attribute", () => {
    const html = `
      <meta itemprop="availability" content="http://schema.org/OutOfStock" />
      <span class="PricesalesPrice">4,80 €</span>`;
    const result = extractStaticQuote(html, staticSite("glutenfreeonline.gr"));
    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.kind).toBe(FailureKind.OUT_OF_STOCK);
  });

  it("reads the price when availability says in stock", () => {
    const html = `
      <meta itemprop="availability" content="http://schema.org/InStock" />
      <span class="PricesalesPrice">4,80 €</span>
      <span class="PricesalesPrice">3,10 €</span>`;
    const result = extractStaticQuote(html, staticSite("glutenfreeonline.gr"));
    expect(result.ok && result.quote.rawPriceText).toBe("4,80 €");
  });

  it("reduces price text to digits and one separator for digit-only sites", () => {
    const html = `<div class="price">3,49 €/τεμ.</div>`;
    const result = extractStaticQuote(html, staticSite("sklavenitis.gr"));
    expect(result.ok && result.quote.rawPriceText).toBe("3,49");
  });

  it("fails with element_not_found when the container is missing", () => {
    const result = extractStaticQuote("<div>nothing here</div>", staticSite("celiacshop.gr"));
    expect(!result.ok && result.failure.kind).toBe(FailureKind.ELEMENT_NOT_FOUND);
    expect(!result.ok && result.failure.siteId).toBe("celiacshop.gr");
  });

  it("fails with element_not_found when no price element matches", () => {
    const result = extractStaticQuote(`<span class="old-price">1,00</span>`, staticSite("wefit.gr"));
    expect(!result.ok && result.failure.kind).toBe(FailureKind.ELEMENT_NOT_FOUND);
  });
});

describe("StaticPageAdapter", () => {
  it("fetches the page and extracts the price", async () => {
    const fetchHtml = vi.fn().mockResolvedValue(`<span id="price_display">6,20 €</span>`);
    const adapter = new StaticPageAdapter(staticSite("thanopoulos.gr"), fetchHtml);

    const result = await adapter.fetch("https://www.thanopoulos.gr/product/1");

    expect(fetchHtml).toHaveBeenCalledWith("https://www.thanopoulos.gr/product/1");
    expect(result.ok && result.quote.rawPriceText).toBe("6,20 €");
    expect(adapter.usesSession).toBe(false);
    expect(adapter.siteId).toBe("thanopoulos.gr");
  });

  it("degrades a failed fetch to transport_error", async () => {
    const fetchHtml = vi.fn().mockRejectedValue(new Error("HTTP 503 for https://www.bio2go.gr/p"));
    const adapter = new StaticPageAdapter(staticSite("bio2go.gr"), fetchHtml);

    const result = await adapter.fetch("https://www.bio2go.gr/p");

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: FailureKind.TRANSPORT_ERROR,
        siteId: "bio2go.gr",
        details: "HTTP 503 for https://www.bio2go.gr/p",
      },
    });
  });
});
