import { parseFoilKind } from "../../domain/inventory";
import type { ColumnMapping, NormalizeResult, RawCsvRow } from "./types";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Largest quantity a single row may ask for. */
export const MAX_QUANTITY = 10_000;

const readCell = (row: RawCsvRow, header: string | undefined): string => {
  if (header === undefined) return "";
  return (row.cells[header] ?? "").trim();
};

/**
 * Quantity cell → integer. Blank or unparsable cells count as one copy.
 */
export function parseQuantity(raw: string | undefined): number {
  const trimmed = (raw ?? "").trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return 1;
  }
  return Number.parseInt(trimmed, 10);
}

export function normalizeRow(row: RawCsvRow, mapping: ColumnMapping): NormalizeResult {
  const setCode = readCell(row, mapping.setCode);
  const collectorNumber = readCell(row, mapping.collectorNumber);

  if (!setCode || !collectorNumber) {
    const missing = [!setCode ? mapping.setCode : null, !collectorNumber ? mapping.collectorNumber : null]
      .filter((value): value is string => value !== null)
      .join(", ");
    return {
      kind: "skip",
      line: row.line,
      reason: "missing_identifier",
      message: `Missing value for ${missing}`,
      silent: false,
    };
  }

  const quantity = mapping.quantity === undefined ? 1 : parseQuantity(readCell(row, mapping.quantity));
  if (quantity <= 0) {
    return {
      kind: "skip",
      line: row.line,
      reason: "non_positive_quantity",
      message: `Quantity ${quantity} for ${setCode}/${collectorNumber}`,
      silent: true,
    };
  }
  if (quantity > MAX_QUANTITY) {
    return {
      kind: "skip",
      line: row.line,
      reason: "quantity_too_large",
      message: `Quantity ${readCell(row, mapping.quantity)} for ${setCode}/${collectorNumber} exceeds ${MAX_QUANTITY}`,
      silent: false,
    };
  }

  const lang = readCell(row, mapping.lang);

  return {
    kind: "row",
    row: {
      line: row.line,
      setCode,
      collectorNumber,
      lang: lang || undefined,
      foilKind: parseFoilKind(readCell(row, mapping.foil)),
      quantity,
    },
  };
}
