import { config } from "../config";
import { AdapterRegistry, toQuote } from "../adapters/registry";
import { RenderingSession, SessionFatalError } from "../scraping/browser";
import { errorMessage } from "../scraping/utils";
import { ResultSink } from "../sink/types";
import {
  FailureKind,
  IdentifierRecord,
  Quote,
  QuoteResult,
  ReconciliationOutcome,
  ReconciliationResult,
  RunSummary,
} from "../types";
import { selectCanonical } from "./select";

export interface EngineOptions {
  registry: AdapterRegistry;
  session: RenderingSession;
  sink: ResultSink;
  rotateEvery?: number;
}

const URL_SCHEME = /^https?:\/\//i;

export function looksLikeUrl(entry: string): boolean {
  return URL_SCHEME.test(entry.trim());
}

/**
 * Reconciles SKUs one at a time: every candidate URL is quoted in order,
 * then the cheapest parseable quote wins. Owns the rendering session for
 * the run and rotates it every `rotateEvery` uses.
 */
export class ReconciliationEngine {
  private readonly registry: AdapterRegistry;
  private readonly session: RenderingSession;
  private readonly sink: ResultSink;
  private readonly rotateEvery: number;
  private sessionUses = 0;
  private skippedEntries = 0;

  constructor(options: EngineOptions) {
    this.registry = options.registry;
    this.session = options.session;
    this.sink = options.sink;
    this.rotateEvery = options.rotateEvery ?? config.sessionRotateEvery;
  }

  get uses(): number {
    return this.sessionUses;
  }

  /** Quote every URL of one SKU and select its canonical result */
  async reconcile(record: IdentifierRecord): Promise<ReconciliationOutcome> {
    const quotes: Quote[] = [];

    for (const entry of record.urls) {
      if (!looksLikeUrl(entry)) {
        if (entry.trim()) this.skippedEntries++;
        continue;
      }
      quotes.push(await this.quoteUrl(entry.trim()));
    }

    const selected = selectCanonical(record.sku, quotes);
    if (!selected) {
      console.log(`[engine] ${record.sku}: no usable price in ${quotes.length} quotes, dropped`);
      return { state: "empty", sku: record.sku, quotes };
    }

    console.log(
      `[engine] ${record.sku}: ${selected.result.minimumPrice} from ${selected.result.winningSourceId} (${quotes.length} quotes)`
    );
    return { state: "resolved", sku: record.sku, quotes, ...selected };
  }

  /** Reconcile every record, appending each result as it resolves, then write the final table */
  async run(records: IdentifierRecord[]): Promise<RunSummary> {
    const startTime = Date.now();
    const rows: ReconciliationResult[] = [];
    let empty = 0;
    let quoteCount = 0;
    this.skippedEntries = 0;

    try {
      for (const record of records) {
        const outcome = await this.reconcile(record);
        quoteCount += outcome.quotes.length;
        if (outcome.state === "empty") {
          empty++;
          continue;
        }
        await this.sink.appendDiagnostic(outcome.diagnostic);
        rows.push(outcome.result);
      }
    } finally {
      await this.session.dispose();
    }

    await this.sink.writeFinalTable(rows);

    return {
      records: records.length,
      resolved: rows.length,
      empty,
      skippedEntries: this.skippedEntries,
      quotes: quoteCount,
      rotations: this.session.rotations,
      durationMs: Date.now() - startTime,
    };
  }

  private async quoteUrl(url: string): Promise<Quote> {
    const kind = this.registry.resolve(url);
    const adapter = this.registry.adapterFor(kind);

    let result: QuoteResult;
    try {
      result = await adapter.fetch(url);
    } catch (error) {
      if (error instanceof SessionFatalError) throw error;
      console.error(`[engine] Adapter ${adapter.siteId ?? "unknown"} threw for ${url}: ${errorMessage(error)}`);
      result = {
        ok: false,
        failure: { kind: FailureKind.TRANSPORT_ERROR, siteId: adapter.siteId, details: errorMessage(error) },
      };
    }

    if (adapter.usesSession) {
      this.sessionUses++;
      if (this.rotateEvery > 0 && this.sessionUses % this.rotateEvery === 0) {
        await this.session.rotate();
      }
    }

    return toQuote(result);
  }
}
