import { DiagnosticEntry, ReconciliationResult } from "../types";

export const FINAL_TABLE_HEADER = ["SKU", "Site", "Price", "Store_Count", "Skroutz_Price"];

/** Where reconciliation results go. Appends are durable per SKU; the table is written once. */
export interface ResultSink {
  appendDiagnostic(entry: DiagnosticEntry): Promise<void>;
  writeFinalTable(rows: ReconciliationResult[]): Promise<void>;
}

export class CompositeResultSink implements ResultSink {
  constructor(private readonly sinks: ResultSink[]) {}

  async appendDiagnostic(entry: DiagnosticEntry): Promise<void> {
    for (const sink of this.sinks) {
      await sink.appendDiagnostic(entry);
    }
  }

  async writeFinalTable(rows: ReconciliationResult[]): Promise<void> {
    for (const sink of this.sinks) {
      await sink.writeFinalTable(rows);
    }
  }
}
