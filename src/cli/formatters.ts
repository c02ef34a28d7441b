import { failureCode, type PipelineFailure } from "../core/entities/appError";
import type { FilingDocument } from "../core/entities/filing";
import type { SectionSpan } from "../core/entities/section";
import type { BatchOutcome, SnapshotBundle } from "../core/entities/snapshot";
import type { TableBlock } from "../core/entities/table";
import { toIsoDate } from "../core/filings/calendar";
import type { PeriodSnapshot } from "../application/services/snapshotCorrelationService";

const describeFiling = (filing: FilingDocument): string =>
  `${filing.formType} ${filing.accessionId} filed ${toIsoDate(filing.filingDate)}`;

const listFilings = (
  lines: string[],
  title: string,
  filings: readonly FilingDocument[],
): void => {
  lines.push(`${title} (${filings.length}):`);
  if (filings.length === 0) {
    lines.push("- none");
    return;
  }
  filings.forEach((filing) => lines.push(`- ${describeFiling(filing)}`));
};

/**
 * Formats a snapshot bundle into a compact terminal report.
 */
export const formatSnapshotReport = (bundle: SnapshotBundle): string => {
  const lines = [`Snapshot for ${bundle.ticker} FY${bundle.fiscalYear}: ${bundle.status}`];
  if (bundle.skippedRecords > 0) {
    lines.push(`Skipped malformed catalog records: ${bundle.skippedRecords}`);
  }

  if (bundle.status === "anchor_missing") {
    lines.push("No annual report is tagged with this fiscal year.");
    return lines.join("\n");
  }

  lines.push(`As of: ${toIsoDate(bundle.asOf)}`);
  lines.push(`Anchor: ${describeFiling(bundle.anchor)}`);

  if (bundle.status === "secondary_missing") {
    lines.push("Secondary anchor: none filed after the anchor");
    return lines.join("\n");
  }

  lines.push(`Secondary anchor: ${describeFiling(bundle.secondaryAnchor)}`);
  listFilings(lines, "Event filings", bundle.eventFilings);
  listFilings(lines, "Ownership filings", bundle.ownershipFilings);
  return lines.join("\n");
};

export const formatPeriodReport = (snapshot: PeriodSnapshot): string => {
  const lines = [
    `Anchor: ${describeFiling(snapshot.anchor)}`,
    `Period end: ${toIsoDate(snapshot.period.periodEnd)}`,
  ];
  listFilings(lines, "Proxy statements", snapshot.period.proxyStatements);
  listFilings(lines, "Voting result candidates", snapshot.period.votingResultCandidates);
  listFilings(lines, "Activist stake filings", snapshot.period.activistStakeFilings);
  return lines.join("\n");
};

export const formatFailure = (failure: PipelineFailure): string =>
  `${failureCode(failure)}: ${failure.message}`;

/**
 * One line per outcome key, sorted, then the skipped requests.
 */
export const formatBatchReport = <TRequest>(
  outcome: BatchOutcome<TRequest, unknown>,
  describeRequest: (request: TRequest) => string,
): string => {
  const lines = [
    `Succeeded: ${outcome.succeeded.length}, skipped: ${outcome.skipped.length}`,
  ];
  Object.entries(outcome.counts)
    .sort(([left], [right]) => left.localeCompare(right))
    .forEach(([key, count]) => lines.push(`- ${key}: ${count}`));

  outcome.skipped.forEach((skip) =>
    lines.push(`skipped ${describeRequest(skip.request)}: ${formatFailure(skip.failure)}`),
  );
  return lines.join("\n");
};

export const formatSection = (key: string, span: SectionSpan): string =>
  `Item ${key} [${span.start}, ${span.end}) ${span.length} chars\n${span.text}`;

export const formatCandidates = (
  key: string,
  candidates: readonly SectionSpan[],
): string =>
  [
    `Item ${key}: ${candidates.length} candidate(s)`,
    ...candidates.map(
      (span) => `- [${span.start}, ${span.end}) ${span.length} chars`,
    ),
  ].join("\n");

export const formatTables = (tables: readonly TableBlock[]): string =>
  tables
    .map((table, index) =>
      [
        `Table ${index + 1} (${table.grid.length} rows)`,
        `  before: ${table.preContext.replaceAll("\n", " ")}`,
        ...table.grid.map((row) => `  | ${row.join(" | ")} |`),
        `  after: ${table.postContext.replaceAll("\n", " ")}`,
      ].join("\n"),
    )
    .join("\n\n");
