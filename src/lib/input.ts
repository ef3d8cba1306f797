import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";
import { config } from "./config";
import { IdentifierRecord } from "./types";

export function splitUrls(cell: string, delimiter: string = config.urlDelimiter): string[] {
  return cell
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Parse input CSV text: column 1 is the SKU, column 2 the delimiter-separated URL list */
export function parseInputCsv(text: string, delimiter: string = config.urlDelimiter): IdentifierRecord[] {
  const rows: string[][] = parse(text.replace(/^\uFEFF/, ""), {
    relax_column_count: true,
    skip_empty_lines: true,
  });

  const records: IdentifierRecord[] = [];
  for (const row of rows) {
    const sku = (row[0] ?? "").trim();
    if (!sku) continue;
    records.push({ sku, urls: splitUrls(row[1] ?? "", delimiter) });
  }
  return records;
}

export function readInputRecords(
  filePath: string = config.inputPath,
  options: { encoding?: BufferEncoding; delimiter?: string } = {}
): IdentifierRecord[] {
  const text = readFileSync(filePath, options.encoding ?? config.inputEncoding);
  const records = parseInputCsv(text, options.delimiter ?? config.urlDelimiter);
  console.log(`[input] Read ${records.length} SKUs from ${filePath}`);
  return records;
}
