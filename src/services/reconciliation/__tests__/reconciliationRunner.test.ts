import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { ReconciliationRunner } from "../reconciliationRunner";
import { AppendProcessor } from "../../inventory/appendProcessor";
import { RemoveProcessor } from "../../inventory/removeProcessor";
import { CardLookup } from "../../catalog/cardLookup";
import { SourceSelector } from "../../source/sourceSelector";
import { InventoryRepository } from "../../../repositories/inventoryRepository";
import { ColumnResolutionError, SourceNotFoundError } from "../../../domain/errors";
import { MockCardDataClient, cardDocument } from "../../../test/mocks/cardDataMock";
import { MockStorageClient, candidate } from "../../../test/mocks/storageMock";
import { createTestDatabase } from "../../../test/mocks/database";
import { silentLogger } from "../../../test/mocks/logger";

const CLOCK = () => new Date("2026-01-15T10:00:00.000Z");

describe("ReconciliationRunner", () => {
  let db: Database.Database;
  let repo: InventoryRepository;
  let client: MockCardDataClient;

  beforeEach(() => {
    db = createTestDatabase();
    repo = new InventoryRepository(db);
    client = new MockCardDataClient()
      .withCard("NEO", "201", cardDocument({ name: "Tamiyo", prices: { usd: "1.00", usd_foil: "2.50" } }))
      .withCard("DMU", "12", cardDocument({ name: "Sheoldred", prices: { usd: "60.00" } }), "ja");
  });

  afterEach(() => {
    db.close();
  });

  const runnerFor = (files: Record<string, string>) => {
    const storage = new MockStorageClient(
      Object.keys(files).map((id, index) => candidate(id, `2026-01-${String(10 + index).padStart(2, "0")}T00:00:00Z`)),
      files,
    );
    const logger = silentLogger();
    return new ReconciliationRunner({
      sourceSelector: new SourceSelector(logger, storage),
      appendProcessor: new AppendProcessor(new CardLookup(client, logger, CLOCK), repo, logger),
      removeProcessor: new RemoveProcessor(repo, logger),
      logger,
      clock: CLOCK,
    });
  };

  it("appends every row and reports per-row issues", async () => {
    const runner = runnerFor({
      inventory: [
        "Set Code,Collector Number,Lang,Foil,Qty",
        "NEO,201,,foil,3",
        "DMU,12,ja,,",
        ",5,,,1",
        "NEO,999,,,1",
        "NEO,201,,,0",
      ].join("\n"),
    });

    const report = await runner.runAppend({ source: { kind: "folder", folderId: "folder-1" }, location: "binder" });

    expect(report).toMatchObject({
      mode: "append",
      source: "inventory.csv",
      rowsRead: 5,
      succeeded: 2,
      skipped: 1,
      ignored: 1,
      failed: 1,
      copiesInserted: 4,
    });
    expect(report.issues.map((issue) => [issue.line, issue.reason])).toEqual([
      [4, "missing_identifier"],
      [5, "lookup_failed"],
    ]);
    expect(repo.listAll().map((copy) => [copy.id, copy.set_code, copy.lang, copy.price_usd, copy.location])).toEqual([
      [1, "NEO", "", 2.5, "binder"],
      [2, "NEO", "", 2.5, "binder"],
      [3, "NEO", "", 2.5, "binder"],
      [4, "DMU", "ja", 60, "binder"],
    ]);
  });

  it("applies column overrides", async () => {
    const runner = runnerFor({ inventory: "Edition,No\nNEO,201\n" });

    const report = await runner.runAppend({
      source: { kind: "folder", folderId: "folder-1" },
      columns: { setCode: "edition", collectorNumber: "no" },
      location: "bulk",
    });

    expect(report.copiesInserted).toBe(1);
  });

  it("removes oldest copies row by row in CSV order", async () => {
    const seed = runnerFor({ inventory: "set_code,collector_number,quantity\nNEO,201,2\n" });
    await seed.runAppend({ source: { kind: "folder", folderId: "folder-1" }, location: "bulk" });

    const runner = runnerFor({ removal: "set_code,collector_number,quantity\nNEO,201,1\nNEO,201,5\n" });
    const report = await runner.runRemove({ source: { kind: "folder", folderId: "folder-1" } });

    expect(report).toMatchObject({ mode: "remove", succeeded: 2, copiesRemoved: 2, shortfall: 4 });
    expect(report.issues).toEqual([
      {
        line: 3,
        reason: "shortfall",
        message: "Removed 1 of 5 copies of NEO/201; short by 4",
        setCode: "NEO",
        collectorNumber: "201",
        lang: undefined,
      },
    ]);
    expect(repo.count()).toBe(0);
  });

  it("aborts before touching the store when a mandatory column is missing", async () => {
    const runner = runnerFor({ inventory: "name,quantity\nTamiyo,1\n" });

    await expect(
      runner.runAppend({ source: { kind: "folder", folderId: "folder-1" }, location: "bulk" }),
    ).rejects.toBeInstanceOf(ColumnResolutionError);
    expect(client.calls).toEqual([]);
    expect(repo.count()).toBe(0);
  });

  it("uses an already resolved source without asking the selector", async () => {
    const runner = runnerFor({});

    const report = await runner.runAppend({
      source: {
        origin: "local",
        name: "manual.csv",
        content: Buffer.from("set_code,collector_number,quantity\nNEO,201,2\n", "utf8"),
      },
      location: "bulk",
    });

    expect(report.source).toBe("manual.csv");
    expect(report.copiesInserted).toBe(2);
    expect(repo.count()).toBe(2);
  });

  it("aborts when the folder is empty", async () => {
    const runner = runnerFor({});

    await expect(runner.runRemove({ source: { kind: "folder", folderId: "folder-1" } })).rejects.toBeInstanceOf(
      SourceNotFoundError,
    );
  });
});
