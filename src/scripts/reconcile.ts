import { config } from "../lib/config";
import { readInputRecords } from "../lib/input";
import { AdapterRegistry } from "../lib/adapters/registry";
import { AggregatorClient } from "../lib/aggregator/client";
import { RenderingSession } from "../lib/scraping/browser";
import { ReconciliationEngine } from "../lib/reconcile/engine";
import { FileResultSink } from "../lib/sink/file-sink";
import { SqliteResultSink } from "../lib/sink/sqlite-sink";
import { CompositeResultSink, ResultSink } from "../lib/sink/types";
import type Database from "better-sqlite3";
import { openDb } from "../lib/db";
import { closeProxyDispatcher } from "../lib/scraping/utils";

interface CliOptions {
  input: string;
  output: string;
  log: string;
  db: string;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    input: config.inputPath,
    output: config.outputPath,
    log: config.diagnosticLogPath,
    db: config.dbPath,
  };

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    switch (args[i]) {
      case "--input":
        if (value) options.input = value;
        i++;
        break;
      case "--output":
        if (value) options.output = value;
        i++;
        break;
      case "--log":
        if (value) options.log = value;
        i++;
        break;
      case "--db":
        if (value) options.db = value;
        i++;
        break;
      case "--no-db":
        options.db = "";
        break;
    }
  }

  return options;
}

let db: Database.Database | null = null;

function closeDb(): void {
  db?.close();
  db = null;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const records = readInputRecords(options.input);

  const sinks: ResultSink[] = [new FileResultSink(options.log, options.output)];
  let history: SqliteResultSink | null = null;
  if (options.db) {
    db = openDb(options.db);
    history = new SqliteResultSink(db);
    sinks.push(history);
  }

  const session = new RenderingSession();
  const registry = new AdapterRegistry({ session, aggregator: new AggregatorClient() });
  const engine = new ReconciliationEngine({ registry, session, sink: new CompositeResultSink(sinks) });

  console.log(`[reconcile] Reconciling ${records.length} SKUs`);
  const summary = await engine.run(records);

  console.log(`\n=== Summary ===`);
  console.log(`SKUs: ${summary.records}`);
  console.log(`Resolved: ${summary.resolved}`);
  console.log(`No price: ${summary.empty}`);
  console.log(`Quotes: ${summary.quotes} (${summary.skippedEntries} non-URL entries skipped)`);
  console.log(`Session rotations: ${summary.rotations}`);
  console.log(`Duration: ${(summary.durationMs / 1000).toFixed(1)}s`);
  if (history) console.log(history.describeRun());

  await shutdown();
  process.exit(0);
}

async function shutdown(): Promise<void> {
  closeDb();
  await closeProxyDispatcher();
}

main().catch(async (err) => {
  console.error("Fatal error:", err);
  await shutdown().catch((closeErr: unknown) => console.error("Shutdown failed:", closeErr));
  process.exit(1);
});
