import { parse as parseCsv } from "csv-parse/sync";
import type { ParsedCsv, RawCsvRow } from "./types";

interface LocatedRecord {
  record: string[];
  /** Line on which the record ends */
  endLine: number;
}

const isCellList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === "string");

const toLocatedRecord = (value: unknown): LocatedRecord | null => {
  if (typeof value !== "object" || value === null) return null;
  if (!("record" in value) || !("info" in value)) return null;
  const { record, info } = value;
  if (!isCellList(record) || typeof info !== "object" || info === null || !("lines" in info)) return null;
  return typeof info.lines === "number" ? { record, endLine: info.lines } : null;
};

const countNewlines = (cells: readonly string[]): number =>
  cells.reduce((total, cell) => total + (cell.match(/\n/g)?.length ?? 0), 0);

const isBlankRecord = (record: string[]): boolean => record.every((cell) => cell.trim() === "");

/**
 * Parse CSV bytes into a header row and records keyed by header.
 *
 * The first record is the header. `line` is the physical line a record starts
 * on, counting blank lines and quoted cells that span lines, so it matches
 * what a text editor shows. A UTF-8 BOM is stripped.
 */
export function readCsv(content: Buffer | string): ParsedCsv {
  const parsed: unknown = parseCsv(content, {
    bom: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });

  const records = Array.isArray(parsed) ? parsed.map(toLocatedRecord) : [];
  const located = records.filter((entry): entry is LocatedRecord => entry !== null);
  if (located.length === 0 || located.length !== records.length) {
    return { headers: [], rows: [] };
  }

  const [headerRecord, ...dataRecords] = located;
  const headers = headerRecord.record.map((header) => header.trim());
  const rows: RawCsvRow[] = [];

  for (const { record, endLine } of dataRecords) {
    if (isBlankRecord(record)) continue;

    const cells: Record<string, string> = {};
    headers.forEach((header, column) => {
      if (Object.hasOwn(cells, header)) return;
      cells[header] = record[column] ?? "";
    });

    rows.push({ line: endLine - countNewlines(record), cells });
  }

  return { headers, rows };
}
