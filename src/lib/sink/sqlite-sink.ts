import { randomUUID } from "crypto";
import type Database from "better-sqlite3";
import { finishRun, getResultsByRunId, getRunById, insertResult, insertRun } from "../db";
import { DiagnosticEntry, ReconciliationResult } from "../types";
import { ResultSink } from "./types";

/** Run history in SQLite: the run row is opened on construction, results land as they resolve */
export class SqliteResultSink implements ResultSink {
  readonly runId: string;

  constructor(
    private readonly db: Database.Database,
    runId: string = randomUUID()
  ) {
    this.runId = runId;
    insertRun(db, { id: runId, startedAt: new Date().toISOString() });
  }

  async appendDiagnostic(entry: DiagnosticEntry): Promise<void> {
    insertResult(this.db, this.runId, entry);
  }

  async writeFinalTable(rows: ReconciliationResult[]): Promise<void> {
    finishRun(this.db, this.runId, rows.length);
    console.log(`[sink] Run ${this.runId} recorded with ${rows.length} results`);
  }

  /** What the database holds for this run, read back from the stored rows */
  describeRun(): string {
    const run = getRunById(this.db, this.runId);
    if (!run) return `Run ${this.runId}: not recorded`;
    const stored = getResultsByRunId(this.db, this.runId).length;
    const state = run.finishedAt ? `finished ${run.finishedAt}` : "not finished";
    return `Run ${run.id}: ${stored} results stored, ${state}`;
  }
}
