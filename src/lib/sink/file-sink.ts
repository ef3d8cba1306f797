import { appendFile, mkdir, writeFile } from "fs/promises";
import path from "path";
import { stringify } from "csv-stringify/sync";
import { DiagnosticEntry, ReconciliationResult } from "../types";
import { FINAL_TABLE_HEADER, ResultSink } from "./types";

export function formatDiagnosticLine(entry: DiagnosticEntry): string {
  return (
    `${entry.sku}, ${entry.minimumPrice}, ${entry.winningSourceId}, ` +
    `[${entry.storeCounts.join(", ")}], [${entry.aggregatorPrices.join(", ")}]\n`
  );
}

export function formatFinalTable(rows: ReconciliationResult[]): string {
  return stringify([
    FINAL_TABLE_HEADER,
    ...rows.map((r) => [
      r.sku,
      r.winningSourceId,
      String(r.minimumPrice),
      r.maxStoreCount === null ? "" : String(r.maxStoreCount),
      r.maxAggregatorPrice === null ? "" : String(r.maxAggregatorPrice),
    ]),
  ]);
}

async function ensureDir(filePath: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
}

/** Text append log (one line per resolved SKU) plus the final CSV table */
export class FileResultSink implements ResultSink {
  constructor(
    private readonly logPath: string,
    private readonly tablePath: string
  ) {}

  async appendDiagnostic(entry: DiagnosticEntry): Promise<void> {
    await ensureDir(this.logPath);
    await appendFile(this.logPath, formatDiagnosticLine(entry), "utf-8");
  }

  async writeFinalTable(rows: ReconciliationResult[]): Promise<void> {
    await ensureDir(this.tablePath);
    await writeFile(this.tablePath, formatFinalTable(rows), "utf-8");
    console.log(`[sink] Wrote ${rows.length} rows to ${this.tablePath}`);
  }
}
