import { parseArgs } from "node:util";
import { parseLocation, type Location } from "./domain/inventory";
import type { ColumnOverrides } from "./services/importer/types";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage:
  binder-ledger append [--local-csv <path> | --folder-id <id>] [--location binder|personal|bulk] [options]
  binder-ledger remove [--local-csv <path> | --folder-id <id>] [options]
  binder-ledger list [--location binder|personal|bulk] [--db <path>] [--json]

Options:
  --credentials <file>   service-account key for folder sources
  --db <path>            SQLite database (default: SQLITE_DB or cards.db)
  --set-col <name>       set code column (default: set_code)
  --num-col <name>       collector number column (default: collector_number)
  --lang-col <name>      language column (default: language)
  --foil-col <name>      foil column (default: foil)
  --qty-col <name>       quantity column (default: quantity)
  --json                 print the run report as JSON
  -h, --help             show this help`;

export const COMMANDS = ["append", "remove", "list"] as const;
export type CommandName = (typeof COMMANDS)[number];

interface CommonArgs {
  dbPath?: string;
  credentialsPath?: string;
  json: boolean;
}

export interface ReconcileArgs extends CommonArgs {
  command: "append" | "remove";
  localCsv?: string;
  folderId?: string;
  /** Append only; undefined means the configured default */
  location?: Location;
  columns: ColumnOverrides;
}

export interface ListArgs extends CommonArgs {
  command: "list";
  location?: Location;
}

export type CliArgs = ReconcileArgs | ListArgs | { command: "help" };

const isCommand = (value: string): value is CommandName => COMMANDS.some((command) => command === value);

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        "local-csv": { type: "string" },
        "folder-id": { type: "string" },
        credentials: { type: "string" },
        db: { type: "string" },
        location: { type: "string" },
        "set-col": { type: "string" },
        "num-col": { type: "string" },
        "lang-col": { type: "string" },
        "foil-col": { type: "string" },
        "qty-col": { type: "string" },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);
  if (values.help === true) return { command: "help" };

  const [command, ...extra] = positionals;
  if (!command) throw new UsageError("Missing command (append, remove or list)");
  if (!isCommand(command)) throw new UsageError(`Unknown command: ${command}`);
  if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra[0]}`);

  let location: Location | undefined;
  if (values.location !== undefined) {
    if (command === "remove") throw new UsageError("--location only applies to append and list");
    const parsedLocation = parseLocation(values.location);
    if (!parsedLocation) {
      throw new UsageError(`Invalid --location: ${values.location} (expected binder, personal or bulk)`);
    }
    location = parsedLocation;
  }

  const common: CommonArgs = {
    dbPath: nonEmpty(values.db),
    credentialsPath: nonEmpty(values.credentials),
    json: values.json === true,
  };

  if (command === "list") {
    return { command, ...common, location };
  }

  const localCsv = nonEmpty(values["local-csv"]);
  const folderId = nonEmpty(values["folder-id"]);
  if (localCsv && folderId) {
    throw new UsageError("Use either --local-csv or --folder-id, not both");
  }

  const columns: ColumnOverrides = {};
  const setCol = nonEmpty(values["set-col"]);
  const numCol = nonEmpty(values["num-col"]);
  const langCol = nonEmpty(values["lang-col"]);
  const foilCol = nonEmpty(values["foil-col"]);
  const qtyCol = nonEmpty(values["qty-col"]);
  if (setCol) columns.setCode = setCol;
  if (numCol) columns.collectorNumber = numCol;
  if (langCol) columns.lang = langCol;
  if (foilCol) columns.foil = foilCol;
  if (qtyCol) columns.quantity = qtyCol;

  return { command, ...common, localCsv, folderId, location, columns };
}
