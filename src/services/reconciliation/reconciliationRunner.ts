/**
 * Reconciliation run orchestration.
 *
 * source → CSV → column mapping → per-row normalize → append/remove → report
 *
 * Fatal problems (no source, unreadable file, mandatory column missing) throw
 * before the first row touches the store. After that every row produces a
 * RowOutcome; rows run strictly one at a time in CSV order.
 */

import type { Logger } from "pino";
import type { Location } from "../../domain/inventory";
import { buildRunReport, type RowOutcome, type RunMode, type RunReport } from "../../domain/report";
import type { AppendProcessor } from "../inventory/appendProcessor";
import type { RemoveProcessor } from "../inventory/removeProcessor";
import { resolveColumns } from "../importer/columnResolver";
import { readCsv } from "../importer/csvReader";
import { normalizeRow } from "../importer/rowNormalizer";
import type { ColumnOverrides, NormalizedRow } from "../importer/types";
import type { SourceSelector } from "../source/sourceSelector";
import type { ResolvedSource, SourceRequest } from "../source/types";

export interface RunOptions {
  /** A request is resolved by the runner; a resolved source is used as is */
  source: SourceRequest | ResolvedSource;
  columns?: ColumnOverrides;
}

export interface AppendRunOptions extends RunOptions {
  location: Location;
}

export interface ReconciliationRunnerDeps {
  sourceSelector: SourceSelector;
  appendProcessor: AppendProcessor;
  removeProcessor: RemoveProcessor;
  logger: Logger;
  clock?: () => Date;
}

export class ReconciliationRunner {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: ReconciliationRunnerDeps) {
    this.logger = deps.logger.child({ service: "ReconciliationRunner" });
    this.clock = deps.clock ?? (() => new Date());
  }

  runAppend(options: AppendRunOptions): Promise<RunReport> {
    return this.run("append", options, (row) => this.deps.appendProcessor.process(row, options.location));
  }

  runRemove(options: RunOptions): Promise<RunReport> {
    return this.run("remove", options, (row) => this.deps.removeProcessor.process(row));
  }

  private async run(
    mode: RunMode,
    options: RunOptions,
    handle: (row: NormalizedRow) => Promise<RowOutcome>,
  ): Promise<RunReport> {
    const startedAt = this.clock();
    const source =
      "origin" in options.source ? options.source : await this.deps.sourceSelector.select(options.source);
    const csv = readCsv(source.content);
    const mapping = resolveColumns(csv.headers, options.columns);

    this.logger.info({ mode, source: source.name, rows: csv.rows.length, mapping }, "Starting reconciliation run");

    const outcomes: RowOutcome[] = [];
    for (const raw of csv.rows) {
      const normalized = normalizeRow(raw, mapping);

      if (normalized.kind === "skip") {
        const context = { line: normalized.line, reason: normalized.reason };
        if (normalized.silent) {
          this.logger.debug(context, normalized.message);
        } else {
          this.logger.warn(context, `Skipping row: ${normalized.message}`);
        }
        outcomes.push({
          status: "skipped",
          line: normalized.line,
          reason: normalized.reason,
          message: normalized.message,
          silent: normalized.silent,
        });
        continue;
      }

      outcomes.push(await handle(normalized.row));
    }

    const report = buildRunReport(mode, source.name, outcomes, startedAt, this.clock());
    this.logger.info(
      {
        mode,
        source: report.source,
        rowsRead: report.rowsRead,
        succeeded: report.succeeded,
        skipped: report.skipped,
        ignored: report.ignored,
        failed: report.failed,
        copiesInserted: report.copiesInserted,
        copiesRemoved: report.copiesRemoved,
        shortfall: report.shortfall,
      },
      "Reconciliation run finished",
    );
    return report;
  }
}
