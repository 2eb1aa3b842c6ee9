import { ColumnResolutionError } from "../../domain/errors";
import type { ColumnMapping, ColumnOverrides, LogicalField } from "./types";

interface FieldSpec {
  defaultName: string;
  /** Tried after the default, in order */
  aliases: string[];
  required: boolean;
}

export const FIELD_SPECS: Record<LogicalField, FieldSpec> = {
  setCode: { defaultName: "set_code", aliases: ["set", "setcode", "set code"], required: true },
  collectorNumber: {
    defaultName: "collector_number",
    aliases: ["collector#", "number", "collector number"],
    required: true,
  },
  lang: { defaultName: "language", aliases: ["lang"], required: false },
  foil: { defaultName: "foil", aliases: ["is_foil", "etched"], required: false },
  quantity: { defaultName: "quantity", aliases: ["qty", "count"], required: false },
};

const headerKey = (value: string): string => value.trim().toLowerCase();

/**
 * Resolve the five logical fields against a header row.
 *
 * Matching is case-insensitive. An override is tried first, then the default
 * name, then the aliases. When several headers differ only by case the first
 * one wins.
 */
export function resolveColumns(headers: readonly string[], overrides: ColumnOverrides = {}): ColumnMapping {
  const byKey = new Map<string, string>();
  for (const header of headers) {
    const key = headerKey(header);
    if (!byKey.has(key)) {
      byKey.set(key, header);
    }
  }

  const find = (field: LogicalField): string | undefined => {
    const names = FIELD_SPECS[field];
    const candidates = [overrides[field], names.defaultName, ...names.aliases];
    for (const candidate of candidates) {
      if (!candidate || !candidate.trim()) continue;
      const actual = byKey.get(headerKey(candidate));
      if (actual !== undefined) return actual;
    }
    return undefined;
  };

  const setCode = find("setCode");
  const collectorNumber = find("collectorNumber");

  if (setCode === undefined || collectorNumber === undefined) {
    const missing: string[] = [];
    if (setCode === undefined) missing.push(overrides.setCode ?? FIELD_SPECS.setCode.defaultName);
    if (collectorNumber === undefined) {
      missing.push(overrides.collectorNumber ?? FIELD_SPECS.collectorNumber.defaultName);
    }
    throw new ColumnResolutionError(missing, [...headers]);
  }

  return {
    setCode,
    collectorNumber,
    lang: find("lang"),
    foil: find("foil"),
    quantity: find("quantity"),
  };
}
