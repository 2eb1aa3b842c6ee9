import type { FoilKind } from "../../domain/inventory";
import type { SkipReason } from "../../domain/report";

export type LogicalField = "setCode" | "collectorNumber" | "lang" | "foil" | "quantity";

export const LOGICAL_FIELDS: readonly LogicalField[] = [
  "setCode",
  "collectorNumber",
  "lang",
  "foil",
  "quantity",
];

/** Caller-supplied header names, tried before the defaults. */
export type ColumnOverrides = Partial<Record<LogicalField, string>>;

/** Logical field → actual header text in this CSV. */
export interface ColumnMapping {
  setCode: string;
  collectorNumber: string;
  lang?: string;
  foil?: string;
  quantity?: string;
}

export interface RawCsvRow {
  /** 1-based line in the file; the header is line 1 */
  line: number;
  cells: Record<string, string>;
}

export interface ParsedCsv {
  headers: string[];
  rows: RawCsvRow[];
}

export interface NormalizedRow {
  line: number;
  setCode: string;
  collectorNumber: string;
  lang?: string;
  foilKind: FoilKind;
  quantity: number;
}

export type NormalizeResult =
  | { kind: "row"; row: NormalizedRow }
  | {
      kind: "skip";
      line: number;
      reason: SkipReason;
      message: string;
      /** Documented fallbacks are not reported as warnings */
      silent: boolean;
    };
