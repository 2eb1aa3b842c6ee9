import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { AppendProcessor } from "../appendProcessor";
import { RemoveProcessor } from "../removeProcessor";
import { CardLookup } from "../../catalog/cardLookup";
import type { NormalizedRow } from "../../importer/types";
import { InventoryRepository } from "../../../repositories/inventoryRepository";
import { LookupError } from "../../../domain/errors";
import { MockCardDataClient, cardDocument } from "../../../test/mocks/cardDataMock";
import { createTestDatabase } from "../../../test/mocks/database";
import { silentLogger } from "../../../test/mocks/logger";

const FETCHED_AT = "2026-01-15T10:00:00.000Z";

const row = (overrides: Partial<NormalizedRow> = {}): NormalizedRow => ({
  line: 2,
  setCode: "NEO",
  collectorNumber: "201",
  foilKind: "normal",
  quantity: 1,
  ...overrides,
});

describe("inventory processors", () => {
  let db: Database.Database;
  let repo: InventoryRepository;
  let client: MockCardDataClient;
  let append: AppendProcessor;
  let remove: RemoveProcessor;

  beforeEach(() => {
    db = createTestDatabase();
    repo = new InventoryRepository(db);
    client = new MockCardDataClient().withCard(
      "NEO",
      "201",
      cardDocument({ name: "Tamiyo", color_identity: ["U", "G"], prices: { usd: "1.00", usd_foil: "2.50" } }),
    );
    const lookup = new CardLookup(client, silentLogger(), () => new Date(FETCHED_AT));
    append = new AppendProcessor(lookup, repo, silentLogger());
    remove = new RemoveProcessor(repo, silentLogger());
  });

  afterEach(() => {
    db.close();
  });

  describe("AppendProcessor", () => {
    it("stores one copy per unit of quantity at the foil price", async () => {
      const outcome = await append.process(row({ foilKind: "foil", quantity: 3 }), "binder");

      expect(outcome).toEqual({
        status: "success",
        row: { line: 2, setCode: "NEO", collectorNumber: "201", lang: undefined },
        requested: 3,
        insertedIds: [1, 2, 3],
        deletedIds: [],
        shortfall: 0,
        priceFallback: false,
      });
      expect(repo.listAll()).toEqual(
        [1, 2, 3].map((id) => ({
          id,
          set_code: "NEO",
          collector_number: "201",
          lang: "",
          name: "Tamiyo",
          color_identity: "U,G",
          price_usd: 2.5,
          location: "binder",
          fetched_at: FETCHED_AT,
        })),
      );
      expect(client.calls).toHaveLength(1);
    });

    it("flags a price fallback when the finish has no price", async () => {
      const outcome = await append.process(row({ foilKind: "etched" }), "bulk");

      expect(outcome.status === "success" && outcome.priceFallback).toBe(true);
      expect(repo.getById(1)?.price_usd).toBe(1);
    });

    it("stores nothing when the lookup fails", async () => {
      client.withFailure("NEO", "300", new LookupError("Scryfall returned 500: Internal Server Error", "http", 500));

      const outcome = await append.process(row({ collectorNumber: "300", quantity: 2 }), "bulk");

      expect(outcome).toEqual({
        status: "failed",
        row: { line: 2, setCode: "NEO", collectorNumber: "300", lang: undefined },
        reason: "lookup_failed",
        message: "Scryfall returned 500: Internal Server Error",
      });
      expect(repo.count()).toBe(0);
    });

    it("appends again on a repeated row", async () => {
      await append.process(row({ quantity: 2 }), "bulk");
      await append.process(row({ quantity: 2 }), "bulk");

      expect(repo.count()).toBe(4);
      expect(client.calls).toHaveLength(2);
    });
  });

  describe("RemoveProcessor", () => {
    it("removes both stored copies and reports a shortfall of three", async () => {
      repo.insertCopies(
        {
          set_code: "NEO",
          collector_number: "201",
          lang: "",
          name: "Tamiyo",
          color_identity: "U,G",
          price_usd: 2.5,
          location: "bulk",
          fetched_at: FETCHED_AT,
        },
        2,
      );

      const outcome = await remove.process(row({ quantity: 5 }));

      expect(outcome).toEqual({
        status: "success",
        row: { line: 2, setCode: "NEO", collectorNumber: "201", lang: undefined },
        requested: 5,
        insertedIds: [],
        deletedIds: [1, 2],
        shortfall: 3,
        priceFallback: false,
      });
      expect(repo.count()).toBe(0);
    });

    it("removes exactly the requested number, oldest first", async () => {
      await append.process(row({ quantity: 4 }), "bulk");

      const outcome = await remove.process(row({ quantity: 2 }));

      expect(outcome.status === "success" && outcome.deletedIds).toEqual([1, 2]);
      expect(repo.findIds({ setCode: "NEO", collectorNumber: "201" })).toEqual([3, 4]);
    });

    it("is a no-op with full shortfall when nothing matches", async () => {
      const outcome = await remove.process(row({ collectorNumber: "999", quantity: 2 }));

      expect(outcome.status === "success" && outcome.deletedIds).toEqual([]);
      expect(outcome.status === "success" && outcome.shortfall).toBe(2);
    });

    it("does not treat a missing language as a wildcard", async () => {
      client.withCard("NEO", "201", cardDocument(), "ja");
      await append.process(row({ lang: "ja" }), "bulk");

      const outcome = await remove.process(row({ quantity: 1 }));

      expect(outcome.status === "success" && outcome.deletedIds).toEqual([]);
      expect(repo.count()).toBe(1);
    });
  });
});
