import type Database from "better-sqlite3";
import type { CardCopy, CardCopyDraft, MatchCriteria } from "../domain/inventory";

interface CardCopyRow {
  id: number;
  set_code: string;
  collector_number: string;
  lang: string | null;
  name: string | null;
  color_identity: string | null;
  price_usd: number | null;
  location: string | null;
  fetched_at: string | null;
}

export interface PriceLocationUpdate {
  id: number;
  price_usd: number | null;
  location: string;
}

export interface RemovalResult {
  /** Matching copies before the delete */
  matched: number;
  /** Ascending; the lowest ids among the matches */
  deletedIds: number[];
}

const COPY_COLUMNS =
  "id, set_code, collector_number, lang, name, color_identity, price_usd, location, fetched_at";

/**
 * SQL fragment for MatchCriteria. Without a language only copies stored
 * without one match (legacy rows may hold NULL rather than '').
 */
const matchClause = (criteria: MatchCriteria): { where: string; params: string[] } => {
  const params = [criteria.setCode, criteria.collectorNumber];
  if (!criteria.lang) {
    return { where: "set_code = ? AND collector_number = ? AND (lang IS NULL OR lang = '')", params };
  }
  return { where: "set_code = ? AND collector_number = ? AND lang = ?", params: [...params, criteria.lang] };
};

export class InventoryRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert `count` identical copies in one transaction. Returned ids are in
   * insertion order and strictly increasing.
   */
  insertCopies(draft: CardCopyDraft, count: number): number[] {
    if (!Number.isInteger(count) || count <= 0) return [];

    const statement = this.db.prepare<Omit<CardCopyRow, "id">>(
      `INSERT INTO cards (
        set_code, collector_number, lang, name, color_identity, price_usd, location, fetched_at
      ) VALUES (@set_code, @collector_number, @lang, @name, @color_identity, @price_usd, @location, @fetched_at)`,
    );

    const insertAll = this.db.transaction((copies: number): number[] => {
      const ids: number[] = [];
      for (let index = 0; index < copies; index += 1) {
        const result = statement.run({
          set_code: draft.set_code,
          collector_number: draft.collector_number,
          lang: draft.lang,
          name: draft.name,
          color_identity: draft.color_identity,
          price_usd: draft.price_usd,
          location: draft.location,
          fetched_at: draft.fetched_at,
        });
        ids.push(Number(result.lastInsertRowid));
      }
      return ids;
    });

    return insertAll(count);
  }

  /** Ids of matching copies, oldest first. */
  findIds(criteria: MatchCriteria): number[] {
    const { where, params } = matchClause(criteria);
    return this.db
      .prepare<string[], { id: number }>(`SELECT id FROM cards WHERE ${where} ORDER BY id ASC`)
      .all(...params)
      .map((row) => row.id);
  }

  deleteIds(ids: readonly number[]): number {
    if (ids.length === 0) return 0;
    const statement = this.db.prepare<[number]>(`DELETE FROM cards WHERE id = ?`);
    const deleteAll = this.db.transaction((targets: readonly number[]): number => {
      let changes = 0;
      for (const id of targets) {
        changes += statement.run(id).changes;
      }
      return changes;
    });
    return deleteAll(ids);
  }

  /**
   * Delete up to `limit` matching copies, lowest id first. The lookup and the
   * delete share one transaction.
   */
  removeOldest(criteria: MatchCriteria, limit: number): RemovalResult {
    const remove = this.db.transaction((): RemovalResult => {
      const ids = this.findIds(criteria);
      const deletedIds = ids.slice(0, Math.max(0, limit));
      this.deleteIds(deletedIds);
      return { matched: ids.length, deletedIds };
    });
    return remove();
  }

  getById(id: number): CardCopy | undefined {
    const row = this.db
      .prepare<[number], CardCopyRow>(`SELECT ${COPY_COLUMNS} FROM cards WHERE id = ?`)
      .get(id);
    return row ? this.mapRow(row) : undefined;
  }

  listAll(location?: string): CardCopy[] {
    const rows = location
      ? this.db
          .prepare<[string], CardCopyRow>(`SELECT ${COPY_COLUMNS} FROM cards WHERE location = ? ORDER BY id ASC`)
          .all(location)
      : this.db.prepare<[], CardCopyRow>(`SELECT ${COPY_COLUMNS} FROM cards ORDER BY id ASC`).all();
    return rows.map((row) => this.mapRow(row));
  }

  count(criteria?: MatchCriteria): number {
    if (!criteria) {
      const row = this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM cards`).get();
      return row?.total ?? 0;
    }
    return this.findIds(criteria).length;
  }

  updatePriceAndLocation(updates: readonly PriceLocationUpdate[]): number {
    if (updates.length === 0) return 0;
    const statement = this.db.prepare<PriceLocationUpdate>(
      `UPDATE cards SET price_usd = @price_usd, location = @location WHERE id = @id`,
    );
    const applyAll = this.db.transaction((batch: readonly PriceLocationUpdate[]): number => {
      let changes = 0;
      for (const update of batch) {
        changes += statement.run({ id: update.id, price_usd: update.price_usd, location: update.location }).changes;
      }
      return changes;
    });
    return applyAll(updates);
  }

  private mapRow(row: CardCopyRow): CardCopy {
    return {
      id: row.id,
      set_code: row.set_code,
      collector_number: row.collector_number,
      lang: row.lang ?? "",
      name: row.name,
      color_identity: row.color_identity ?? "",
      price_usd: row.price_usd,
      location: row.location ?? "",
      fetched_at: row.fetched_at,
    };
  }
}
