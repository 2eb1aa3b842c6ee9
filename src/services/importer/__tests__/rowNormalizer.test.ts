import { describe, it, expect } from "vitest";
import { MAX_QUANTITY, normalizeRow, parseQuantity } from "../rowNormalizer";
import type { ColumnMapping, RawCsvRow } from "../types";

const mapping: ColumnMapping = {
  setCode: "set_code",
  collectorNumber: "collector_number",
  lang: "language",
  foil: "foil",
  quantity: "quantity",
};

const raw = (cells: Record<string, string>, line = 2): RawCsvRow => ({ line, cells });

describe("parseQuantity", () => {
  it("reads integers", () => {
    expect(parseQuantity("3")).toBe(3);
    expect(parseQuantity(" 12 ")).toBe(12);
    expect(parseQuantity("-2")).toBe(-2);
    expect(parseQuantity("0")).toBe(0);
  });

  it("treats blank and unparsable values as one copy", () => {
    expect(parseQuantity("")).toBe(1);
    expect(parseQuantity(undefined)).toBe(1);
    expect(parseQuantity("two")).toBe(1);
    expect(parseQuantity("1.5")).toBe(1);
  });
});

describe("normalizeRow", () => {
  it("normalizes a complete row", () => {
    const result = normalizeRow(
      raw({ set_code: " NEO ", collector_number: "201", language: "ja", foil: "Foil", quantity: "3" }, 5),
      mapping,
    );

    expect(result).toEqual({
      kind: "row",
      row: { line: 5, setCode: "NEO", collectorNumber: "201", lang: "ja", foilKind: "foil", quantity: 3 },
    });
  });

  it("parses foil text into finishes", () => {
    const foilOf = (foil: string) => {
      const result = normalizeRow(raw({ set_code: "NEO", collector_number: "1", foil }), mapping);
      return result.kind === "row" ? result.row.foilKind : null;
    };

    expect(foilOf("Foil")).toBe("foil");
    expect(foilOf("FOIL")).toBe("foil");
    expect(foilOf("etched ")).toBe("etched");
    expect(foilOf("holo")).toBe("normal");
    expect(foilOf("")).toBe("normal");
  });

  it("leaves lang undefined when the cell is blank", () => {
    const result = normalizeRow(raw({ set_code: "NEO", collector_number: "1", language: "  " }), mapping);

    expect(result.kind === "row" && result.row.lang).toBeUndefined();
  });

  it("defaults quantity to one without a quantity column", () => {
    const result = normalizeRow(raw({ set_code: "NEO", collector_number: "1" }), {
      setCode: "set_code",
      collectorNumber: "collector_number",
    });

    expect(result.kind === "row" && result.row.quantity).toBe(1);
  });

  it("skips rows without identifiers and says which cell was empty", () => {
    const result = normalizeRow(raw({ set_code: "", collector_number: "201" }, 7), mapping);

    expect(result).toEqual({
      kind: "skip",
      line: 7,
      reason: "missing_identifier",
      message: "Missing value for set_code",
      silent: false,
    });
  });

  it("drops non-positive quantities silently", () => {
    const result = normalizeRow(raw({ set_code: "NEO", collector_number: "201", quantity: "0" }, 3), mapping);

    expect(result).toEqual({
      kind: "skip",
      line: 3,
      reason: "non_positive_quantity",
      message: "Quantity 0 for NEO/201",
      silent: true,
    });
  });

  it("accepts the largest allowed quantity", () => {
    const result = normalizeRow(
      raw({ set_code: "NEO", collector_number: "201", quantity: String(MAX_QUANTITY) }),
      mapping,
    );

    expect(result.kind === "row" && result.row.quantity).toBe(10_000);
  });

  it("reports quantities above the limit instead of storing them", () => {
    const result = normalizeRow(
      raw({ set_code: "NEO", collector_number: "201", quantity: "99999999999999999999" }, 6),
      mapping,
    );

    expect(result).toEqual({
      kind: "skip",
      line: 6,
      reason: "quantity_too_large",
      message: "Quantity 99999999999999999999 for NEO/201 exceeds 10000",
      silent: false,
    });
  });

  it("rejects a quantity one past the limit", () => {
    const result = normalizeRow(raw({ set_code: "NEO", collector_number: "201", quantity: "10001" }), mapping);

    expect(result.kind === "skip" && result.reason).toBe("quantity_too_large");
  });
});
