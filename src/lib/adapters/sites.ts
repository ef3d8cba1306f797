import { SiteRule } from "./types";

const OUT_OF_STOCK_LABEL = "Εξαντλημένο";
const WOO_PRICE = "span.woocommerce-Price-amount.amount";

/**
 * Dispatch table, evaluated top to bottom. The aggregator and the rendered
 * site come first so they never fall through to a plain HTTP fetch.
 */
export const SITE_TABLE: SiteRule[] = [
  { type: "aggregator", site: { id: "skroutz", domain: "skroutz.gr" } },
  {
    type: "rendered",
    site: {
      id: "e-fresh.gr",
      domain: "e-fresh.gr",
      notFoundSelector: ".error-404",
      priceSelector: ".price",
    },
  },
  {
    type: "static",
    site: {
      id: "glutenfreeyourself.gr",
      domain: "glutenfreeyourself.gr",
      container: "div.basel-scroll-content",
      stock: { selector: "p.stock", values: [OUT_OF_STOCK_LABEL] },
      priceSelector: WOO_PRICE,
      preferSecond: true,
    },
  },
  {
    type: "static",
    site: {
      id: "glutenfreeonline.gr",
      domain: "glutenfreeonline.gr",
      stock: {
        selector: "[itemprop=availability]",
        attribute: "content",
        values: ["http://schema.org/OutOfStock", "https://schema.org/OutOfStock"],
      },
      priceSelector: "span.PricesalesPrice",
    },
  },
  {
    type: "static",
    site: { id: "thanopoulos.gr", domain: "thanopoulos.gr", priceSelector: "span#price_display" },
  },
  {
    type: "static",
    site: { id: "sklavenitis.gr", domain: "sklavenitis.gr", priceSelector: "div.price", digitsOnly: true },
  },
  {
    type: "static",
    site: {
      id: "biohealthyfood.gr",
      domain: "biohealthyfood.gr",
      container: "div.single-product-content",
      stock: { selector: "p.stock", values: [OUT_OF_STOCK_LABEL] },
      priceSelector: WOO_PRICE,
      preferSecond: true,
    },
  },
  {
    type: "static",
    site: {
      id: "celiacshop.gr",
      domain: "celiacshop.gr",
      container: "div.product-info.summary.entry-summary",
      priceSelector: WOO_PRICE,
      preferSecond: true,
    },
  },
  {
    type: "static",
    site: { id: "eblokomarket.gr", domain: "eblokomarket.gr", priceSelector: "span.product-price" },
  },
  {
    type: "static",
    site: { id: "mymarket.gr", domain: "mymarket.gr", priceSelector: "span.product-full--final-price" },
  },
  {
    type: "static",
    site: { id: "bio2go.gr", domain: "bio2go.gr", priceSelector: "span#price" },
  },
  {
    type: "static",
    site: { id: "wefit.gr", domain: "wefit.gr", priceSelector: "span.actual-price" },
  },
  {
    type: "static",
    site: { id: "2pharmacy.gr", domain: "2pharmacy.gr", priceSelector: "span#our_price_display" },
  },
  {
    type: "static",
    site: { id: "greenhousebio.gr", domain: "greenhousebio.gr", priceSelector: "span[itemprop=price]" },
  },
];
