/**
 * Inventory domain types.
 *
 * One `cards` row is one physical copy. Quantity in an import CSV expands into
 * that many rows; removal deletes the oldest (lowest id) copies first.
 */

export const FOIL_KINDS = ["normal", "foil", "etched"] as const;
export type FoilKind = (typeof FOIL_KINDS)[number];

export const LOCATIONS = ["binder", "personal", "bulk"] as const;
export type Location = (typeof LOCATIONS)[number];

export const DEFAULT_LOCATION: Location = "bulk";

/**
 * Map free text from a CSV cell to a finish. Anything unrecognized
 * (including blank) is a normal printing.
 */
export function parseFoilKind(raw: string | null | undefined): FoilKind {
  const normalized = (raw ?? "").trim().toLowerCase();
  for (const kind of FOIL_KINDS) {
    if (kind === normalized) return kind;
  }
  return "normal";
}

/**
 * Map free text to a storage location, or null when it is not one we know.
 */
export function parseLocation(raw: string | null | undefined): Location | null {
  const normalized = (raw ?? "").trim().toLowerCase();
  for (const location of LOCATIONS) {
    if (location === normalized) return location;
  }
  return null;
}

/** Persisted copy (row of the `cards` table). */
export interface CardCopy {
  id: number;
  set_code: string;
  collector_number: string;
  /** Empty string when the import row had no language */
  lang: string;
  name: string | null;
  /** Color identity symbols joined with "," in API order */
  color_identity: string;
  price_usd: number | null;
  location: string;
  /** ISO-8601; null for copies stored before fetch timestamps were recorded */
  fetched_at: string | null;
}

export type CardCopyDraft = Omit<CardCopy, "id" | "location"> & { location: Location };

/**
 * Criteria for removal. An absent lang only matches copies stored without a
 * language; it is not a wildcard.
 */
export interface MatchCriteria {
  setCode: string;
  collectorNumber: string;
  lang?: string;
}

export const COLOR_IDENTITY_SEPARATOR = ",";

export const joinColorIdentity = (symbols: readonly string[]): string =>
  symbols.join(COLOR_IDENTITY_SEPARATOR);
