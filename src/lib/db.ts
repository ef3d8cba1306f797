import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import path from "path";
import { DiagnosticEntry, ReconciliationResult } from "./types";
import { positiveMax } from "./reconcile/select";

export interface ReconcileRun {
  id: string;
  startedAt: string;
  finishedAt: string | null;
  resultCount: number;
}

interface RunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  result_count: number;
}

interface ResultRow {
  sku: string;
  winning_source_id: string;
  minimum_price: number;
  max_store_count: number | null;
  max_aggregator_price: number | null;
}

export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const handle = new Database(dbPath);
  handle.pragma("journal_mode = WAL");
  handle.pragma("foreign_keys = ON");
  initSchema(handle);
  return handle;
}

function initSchema(handle: Database.Database): void {
  handle.exec(`
    CREATE TABLE IF NOT EXISTS reconcile_runs (
      id TEXT PRIMARY KEY,
      started_at TEXT NOT NULL,
      finished_at TEXT,
      result_count INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS reconcile_results (
      run_id TEXT NOT NULL REFERENCES reconcile_runs(id),
      sku TEXT NOT NULL,
      winning_source_id TEXT NOT NULL,
      minimum_price REAL NOT NULL,
      max_store_count INTEGER,
      max_aggregator_price REAL,
      store_counts_json TEXT NOT NULL,
      aggregator_prices_json TEXT NOT NULL,
      recorded_at TEXT NOT NULL,
      PRIMARY KEY (run_id, sku)
    );

    CREATE INDEX IF NOT EXISTS idx_results_sku ON reconcile_results(sku);
  `);
}

export function insertRun(handle: Database.Database, run: { id: string; startedAt: string }): void {
  handle
    .prepare("INSERT INTO reconcile_runs (id, started_at) VALUES (?, ?)")
    .run(run.id, run.startedAt);
}

export function insertResult(handle: Database.Database, runId: string, entry: DiagnosticEntry): void {
  handle
    .prepare(
      `INSERT OR REPLACE INTO reconcile_results
        (run_id, sku, winning_source_id, minimum_price, max_store_count, max_aggregator_price,
         store_counts_json, aggregator_prices_json, recorded_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      runId,
      entry.sku,
      entry.winningSourceId,
      entry.minimumPrice,
      positiveMax(entry.storeCounts),
      positiveMax(entry.aggregatorPrices),
      JSON.stringify(entry.storeCounts),
      JSON.stringify(entry.aggregatorPrices),
      new Date().toISOString()
    );
}

export function finishRun(handle: Database.Database, runId: string, resultCount: number): void {
  handle
    .prepare("UPDATE reconcile_runs SET finished_at = ?, result_count = ? WHERE id = ?")
    .run(new Date().toISOString(), resultCount, runId);
}

export function getRunById(handle: Database.Database, id: string): ReconcileRun | null {
  const row = handle.prepare<[string], RunRow>("SELECT * FROM reconcile_runs WHERE id = ?").get(id);
  if (!row) return null;
  return {
    id: row.id,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    resultCount: row.result_count,
  };
}

export function getResultsByRunId(handle: Database.Database, runId: string): ReconciliationResult[] {
  return handle
    .prepare<[string], ResultRow>(
      `SELECT sku, winning_source_id, minimum_price, max_store_count, max_aggregator_price
       FROM reconcile_results WHERE run_id = ? ORDER BY rowid`
    )
    .all(runId)
    .map((row) => ({
      sku: row.sku,
      winningSourceId: row.winning_source_id,
      minimumPrice: row.minimum_price,
      maxStoreCount: row.max_store_count,
      maxAggregatorPrice: row.max_aggregator_price,
    }));
}
