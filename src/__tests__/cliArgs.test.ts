import { describe, it, expect } from "vitest";
import { UsageError, parseCliArgs } from "../cliArgs";

describe("parseCliArgs", () => {
  it("parses an append run with overrides", () => {
    const args = parseCliArgs([
      "append",
      "--local-csv",
      "cards.csv",
      "--location",
      "Binder",
      "--set-col",
      "Edition",
      "--qty-col",
      "Count",
      "--json",
    ]);

    expect(args).toEqual({
      command: "append",
      dbPath: undefined,
      credentialsPath: undefined,
      json: true,
      localCsv: "cards.csv",
      folderId: undefined,
      location: "binder",
      columns: { setCode: "Edition", quantity: "Count" },
    });
  });

  it("parses a remove run from a folder", () => {
    const args = parseCliArgs(["remove", "--folder-id", "folder-1", "--credentials", "sa.json", "--db", "test.db"]);

    expect(args).toEqual({
      command: "remove",
      dbPath: "test.db",
      credentialsPath: "sa.json",
      json: false,
      localCsv: undefined,
      folderId: "folder-1",
      location: undefined,
      columns: {},
    });
  });

  it("parses list with a location filter", () => {
    expect(parseCliArgs(["list", "--location", "bulk"])).toEqual({
      command: "list",
      dbPath: undefined,
      credentialsPath: undefined,
      json: false,
      location: "bulk",
    });
  });

  it("returns help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ command: "help" });
  });

  it.each<{ argv: string[]; message: string }>([
    { argv: [], message: "Missing command (append, remove or list)" },
    { argv: ["sync"], message: "Unknown command: sync" },
    { argv: ["append", "extra"], message: "Unexpected argument: extra" },
    { argv: ["append", "--location", "attic"], message: "Invalid --location: attic (expected binder, personal or bulk)" },
    { argv: ["remove", "--location", "bulk"], message: "--location only applies to append and list" },
    {
      argv: ["append", "--local-csv", "a.csv", "--folder-id", "f"],
      message: "Use either --local-csv or --folder-id, not both",
    },
  ])("rejects $argv", ({ argv, message }) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message));
  });

  it("rejects unknown flags as usage errors", () => {
    expect(() => parseCliArgs(["append", "--verbose"])).toThrow(UsageError);
  });
});
