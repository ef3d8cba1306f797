import { ExtractionFailure, FailureKind, Quote, QuoteResult } from "../types";
import { RenderingSession } from "../scraping/browser";
import { AggregatorClient } from "../aggregator/client";
import { SITE_TABLE } from "./sites";
import { HtmlFetcher, StaticPageAdapter } from "./static-page";
import { RenderedPageAdapter } from "./rendered-page";
import { Adapter, AdapterKind, SiteRule, failure } from "./types";

const UNKNOWN_ADAPTER: Adapter = {
  type: "unknown",
  siteId: null,
  usesSession: false,
  async fetch(): Promise<QuoteResult> {
    return failure(FailureKind.SITE_UNKNOWN, null);
  },
};

export interface AdapterRegistryDeps {
  session: RenderingSession;
  aggregator: AggregatorClient;
  fetchHtml?: HtmlFetcher;
  table?: SiteRule[];
}

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/** Diagnostic source id for a failed extraction, used for triage only */
export function failureTag(f: ExtractionFailure): string {
  const site = f.siteId ?? "unknown";
  switch (f.kind) {
    case FailureKind.OUT_OF_STOCK:
      return `out-of-stock-${site}`;
    case FailureKind.ELEMENT_NOT_FOUND:
      return `element-not-found-${site}`;
    case FailureKind.TRANSPORT_ERROR:
      return `transport-error-${site}`;
    case FailureKind.MALFORMED_INPUT:
      return `malformed-url-${site}`;
    case FailureKind.SITE_UNKNOWN:
      return "site-NA";
    case FailureKind.AGGREGATOR_UNRESOLVED:
      return "aggregator-unresolved";
  }
}

/** Collapse a QuoteResult into the quote the engine aggregates over */
export function toQuote(result: QuoteResult): Quote {
  if (result.ok) return result.quote;
  return Object.freeze({
    sourceId: failureTag(result.failure),
    rawPriceText: null,
    storeCount: 0,
    aggregatorReferencePrice: null,
  });
}

export class AdapterRegistry {
  private readonly table: SiteRule[];
  private readonly adapters = new Map<string, Adapter>();

  constructor(private readonly deps: AdapterRegistryDeps) {
    this.table = deps.table ?? SITE_TABLE;
  }

  resolve(url: string): AdapterKind {
    let host: string;
    try {
      host = new URL(url.trim()).hostname.toLowerCase();
    } catch {
      return { type: "unknown" };
    }

    const rule = this.table.find((r) => hostMatches(host, r.site.domain));
    return rule ?? { type: "unknown" };
  }

  adapterFor(kind: AdapterKind): Adapter {
    if (kind.type === "unknown") return UNKNOWN_ADAPTER;

    const cached = this.adapters.get(kind.site.id);
    if (cached) return cached;

    let adapter: Adapter;
    switch (kind.type) {
      case "static":
        adapter = new StaticPageAdapter(kind.site, this.deps.fetchHtml);
        break;
      case "rendered":
        adapter = new RenderedPageAdapter(kind.site, this.deps.session);
        break;
      case "aggregator":
        adapter = this.deps.aggregator;
        break;
    }
    this.adapters.set(kind.site.id, adapter);
    return adapter;
  }

  async fetch(url: string, kind: AdapterKind = this.resolve(url)): Promise<QuoteResult> {
    return this.adapterFor(kind).fetch(url.trim());
  }
}
