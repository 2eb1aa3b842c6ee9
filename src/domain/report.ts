/**
 * Per-row results and the end-of-run report.
 *
 * Row-level problems never abort a run; each row yields exactly one
 * RowOutcome and the report aggregates them.
 */

export type RunMode = "append" | "remove";

export interface RowRef {
  line: number;
  setCode: string;
  collectorNumber: string;
  lang?: string;
}

export type SkipReason = "missing_identifier" | "non_positive_quantity" | "quantity_too_large";

export type FailureReason = "lookup_failed";

export type RowOutcome =
  | {
      status: "success";
      row: RowRef;
      requested: number;
      insertedIds: number[];
      deletedIds: number[];
      /** Remove mode: requested copies that had no match */
      shortfall: number;
      /** Append mode: foil/etched price missing, normal price stored instead */
      priceFallback: boolean;
    }
  | { status: "skipped"; line: number; reason: SkipReason; message: string; silent: boolean }
  | { status: "failed"; row: RowRef; reason: FailureReason; message: string };

export type IssueReason = SkipReason | FailureReason | "shortfall" | "no_match" | "price_fallback";

export interface ReportIssue {
  line: number;
  reason: IssueReason;
  message: string;
  setCode?: string;
  collectorNumber?: string;
  lang?: string;
}

export interface RunReport {
  mode: RunMode;
  source: string;
  startedAt: string;
  finishedAt: string;
  rowsRead: number;
  succeeded: number;
  /** Rows skipped for a reported reason */
  skipped: number;
  /** Rows dropped by a documented fallback (quantity ≤ 0) */
  ignored: number;
  failed: number;
  copiesInserted: number;
  copiesRemoved: number;
  shortfall: number;
  issues: ReportIssue[];
}

const describeRow = (row: RowRef): string =>
  `${row.setCode}/${row.collectorNumber}${row.lang ? `/${row.lang}` : ""}`;

export function buildRunReport(
  mode: RunMode,
  source: string,
  outcomes: readonly RowOutcome[],
  startedAt: Date,
  finishedAt: Date,
): RunReport {
  const report: RunReport = {
    mode,
    source,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    rowsRead: outcomes.length,
    succeeded: 0,
    skipped: 0,
    ignored: 0,
    failed: 0,
    copiesInserted: 0,
    copiesRemoved: 0,
    shortfall: 0,
    issues: [],
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "success": {
        const { row } = outcome;
        report.succeeded += 1;
        report.copiesInserted += outcome.insertedIds.length;
        report.copiesRemoved += outcome.deletedIds.length;
        report.shortfall += outcome.shortfall;

        if (outcome.shortfall > 0) {
          const noMatch = outcome.deletedIds.length === 0;
          report.issues.push({
            line: row.line,
            reason: noMatch ? "no_match" : "shortfall",
            message: noMatch
              ? `No stored copies of ${describeRow(row)}; nothing removed`
              : `Removed ${outcome.deletedIds.length} of ${outcome.requested} copies of ${describeRow(row)}; short by ${outcome.shortfall}`,
            setCode: row.setCode,
            collectorNumber: row.collectorNumber,
            lang: row.lang,
          });
        }
        if (outcome.priceFallback) {
          report.issues.push({
            line: row.line,
            reason: "price_fallback",
            message: `Requested finish has no price for ${describeRow(row)}; stored the normal price`,
            setCode: row.setCode,
            collectorNumber: row.collectorNumber,
            lang: row.lang,
          });
        }
        break;
      }
      case "skipped":
        if (outcome.silent) {
          report.ignored += 1;
          break;
        }
        report.skipped += 1;
        report.issues.push({ line: outcome.line, reason: outcome.reason, message: outcome.message });
        break;
      case "failed":
        report.failed += 1;
        report.issues.push({
          line: outcome.row.line,
          reason: outcome.reason,
          message: outcome.message,
          setCode: outcome.row.setCode,
          collectorNumber: outcome.row.collectorNumber,
          lang: outcome.row.lang,
        });
        break;
    }
  }

  return report;
}
