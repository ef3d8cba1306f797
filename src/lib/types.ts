// ===== Input =====

/** One input row: a SKU and its candidate product URLs, in file order */
export interface IdentifierRecord {
  sku: string;
  urls: string[];
}

// ===== Quotes =====

/** Raw per-source extraction result, before normalization */
export interface Quote {
  sourceId: string;
  rawPriceText: string | null;
  storeCount: number;
  aggregatorReferencePrice: string | null;
}

export enum FailureKind {
  OUT_OF_STOCK = "out_of_stock",
  ELEMENT_NOT_FOUND = "element_not_found",
  TRANSPORT_ERROR = "transport_error",
  MALFORMED_INPUT = "malformed_input",
  SITE_UNKNOWN = "site_unknown",
  AGGREGATOR_UNRESOLVED = "aggregator_unresolved",
}

export interface ExtractionFailure {
  kind: FailureKind;
  siteId: string | null;
  details?: string;
}

export type QuoteResult =
  | { ok: true; quote: Quote }
  | { ok: false; failure: ExtractionFailure };

// ===== Reconciliation =====

export interface ReconciliationResult {
  sku: string;
  winningSourceId: string;
  minimumPrice: number;
  maxStoreCount: number | null;
  maxAggregatorPrice: number | null;
}

export type ReconciliationOutcome =
  | { state: "resolved"; sku: string; quotes: Quote[]; result: ReconciliationResult; diagnostic: DiagnosticEntry }
  | { state: "empty"; sku: string; quotes: Quote[] };

/** Per-identifier record written to the append log as soon as it resolves */
export interface DiagnosticEntry {
  sku: string;
  minimumPrice: number;
  winningSourceId: string;
  storeCounts: number[];
  aggregatorPrices: number[];
}

export interface RunSummary {
  records: number;
  resolved: number;
  empty: number;
  skippedEntries: number;
  quotes: number;
  rotations: number;
  durationMs: number;
}
