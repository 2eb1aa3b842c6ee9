/**
 * Command-line front end: append, remove and list.
 *
 * Exit codes: 0 when the run completed (row-level issues included),
 * 1 for fatal errors, 2 for usage errors.
 */

import { createLogger, createStorage, withContext, type ContextOverrides } from "./app/context";
import { USAGE, UsageError, parseCliArgs, type ListArgs, type ReconcileArgs } from "./cliArgs";
import { buildRuntimeConfig, type EnvInput, type RuntimeConfig } from "./config";
import { isFatalRunError } from "./domain/errors";
import type { CardCopy } from "./domain/inventory";
import type { RunReport } from "./domain/report";
import { SourceSelector } from "./services/source/sourceSelector";
import type { ResolvedSource, SourceRequest } from "./services/source/types";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  env?: EnvInput;
  io?: CliIo;
  overrides?: ContextOverrides;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export function formatReport(report: RunReport): string {
  const lines = [
    `${report.mode} from ${report.source}: ${report.rowsRead} rows read, ${report.succeeded} succeeded, ` +
      `${report.skipped} skipped, ${report.ignored} ignored, ${report.failed} failed`,
    report.mode === "append"
      ? `copies inserted: ${report.copiesInserted}`
      : `copies removed: ${report.copiesRemoved}, shortfall: ${report.shortfall}`,
  ];
  if (report.issues.length > 0) {
    lines.push("issues:");
    for (const issue of report.issues) {
      lines.push(`  line ${issue.line} [${issue.reason}] ${issue.message}`);
    }
  }
  return lines.join("\n");
}

export function formatCopies(copies: readonly CardCopy[]): string {
  if (copies.length === 0) return "No cards stored.";
  const header = ["id", "set", "number", "lang", "name", "price_usd", "location"];
  const rows = copies.map((copy) => [
    String(copy.id),
    copy.set_code,
    copy.collector_number,
    copy.lang,
    copy.name ?? "",
    copy.price_usd === null ? "" : copy.price_usd.toFixed(2),
    copy.location,
  ]);
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const render = (cells: readonly string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join("  ")
      .trimEnd();
  return [render(header), ...rows.map(render)].join("\n");
}

function resolveSource(args: ReconcileArgs, config: RuntimeConfig): SourceRequest {
  if (args.localCsv) return { kind: "local", path: args.localCsv };
  const folderId = args.folderId ?? config.drive.folderId;
  if (folderId) return { kind: "folder", folderId };
  throw new UsageError("No source: pass --local-csv or --folder-id (or set DRIVE_FOLDER_ID)");
}

function applyArgs(config: RuntimeConfig, args: ReconcileArgs | ListArgs): RuntimeConfig {
  return {
    ...config,
    sqlitePath: args.dbPath ?? config.sqlitePath,
    drive: { ...config.drive, credentialsPath: args.credentialsPath ?? config.drive.credentialsPath },
  };
}

interface PreparedRun {
  args: ReconcileArgs | ListArgs;
  config: RuntimeConfig;
  source?: SourceRequest;
}

function prepareRun(argv: readonly string[], env: EnvInput): PreparedRun | "help" {
  const args = parseCliArgs(argv);
  if (args.command === "help") return "help";
  const config = applyArgs(buildRuntimeConfig(env), args);
  return { args, config, source: args.command === "list" ? undefined : resolveSource(args, config) };
}

export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;

  let prepared: PreparedRun | "help";
  try {
    prepared = prepareRun(argv, options.env ?? process.env);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (isFatalRunError(error)) {
      io.stderr(error.message);
      return EXIT_FATAL;
    }
    throw error;
  }

  if (prepared === "help") {
    io.stdout(USAGE);
    return EXIT_OK;
  }
  const { args, config, source } = prepared;
  const logger = options.overrides?.logger ?? createLogger(config.logLevel);

  try {
    const overrides: ContextOverrides = {
      ...options.overrides,
      logger,
      storage: options.overrides?.storage ?? createStorage(config, logger),
    };
    // Source first: a source that cannot be read must not create the database.
    const resolved: ResolvedSource | undefined = source
      ? await new SourceSelector(logger, overrides.storage).select(source)
      : undefined;

    return await withContext(
      config,
      async (ctx) => {
        if (args.command === "list") {
          const copies = ctx.inventoryRepo.listAll(args.location);
          io.stdout(args.json ? JSON.stringify(copies, null, 2) : formatCopies(copies));
          return EXIT_OK;
        }

        if (!resolved) throw new UsageError("No source");
        const report =
          args.command === "append"
            ? await ctx.runner.runAppend({
                source: resolved,
                columns: args.columns,
                location: args.location ?? config.defaultLocation,
              })
            : await ctx.runner.runRemove({ source: resolved, columns: args.columns });

        io.stdout(args.json ? JSON.stringify(report, null, 2) : formatReport(report));
        return EXIT_OK;
      },
      overrides,
    );
  } catch (error) {
    if (isFatalRunError(error)) {
      io.stderr(`${error.name}: ${error.message}`);
      return EXIT_FATAL;
    }
    io.stderr(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FATAL;
  }
}
