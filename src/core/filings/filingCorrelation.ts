import { err, ok, type Result } from "neverthrow";
import {
  segmentationError,
  type SegmentationError,
} from "../entities/appError";
import {
  formRoles,
  type FilingDocument,
  type FormRole,
} from "../entities/filing";
import { pickExtremal } from "../ranking/pickExtremal";
import { toIsoDate } from "./calendar";
import { applyWindow, windowPolicy } from "./filingWindows";

const withRole = (
  filings: readonly FilingDocument[],
  role: FormRole,
): FilingDocument[] =>
  filings.filter((filing) => formRoles[filing.formType] === role);

/**
 * Picks the anchor report tagged with the target fiscal year. Amendments and
 * duplicates resolve to the latest filing date; untagged filings never match.
 */
export const selectAnchorFiling = (
  filings: readonly FilingDocument[],
  fiscalYear: number,
): FilingDocument | null =>
  pickExtremal(
    withRole(filings, "anchor_report").filter(
      (filing) => filing.fiscalYear === fiscalYear,
    ),
    (filing) => filing.filingDate.getTime(),
    "max",
  ) ?? null;

/**
 * Picks the first proxy statement filed strictly after the anchor's filing date.
 */
export const selectSecondaryAnchor = (
  filings: readonly FilingDocument[],
  anchorFilingDate: Date,
): Result<FilingDocument | null, SegmentationError> =>
  applyWindow(withRole(filings, "proxy_statement"), {
    kind: "after",
    anchor: anchorFilingDate,
    start: "exclusive",
  }).map(
    (window) =>
      pickExtremal(
        window.filings,
        (filing) => filing.filingDate.getTime(),
        "min",
      ) ?? null,
  );

export type ContextFilings = {
  eventFilings: FilingDocument[];
  ownershipFilings: FilingDocument[];
};

/**
 * Event reports from the trailing year and ownership reports from the
 * trailing half-year, both windows closed on each end at the reference date.
 */
export const selectContextFilings = (
  filings: readonly FilingDocument[],
  referenceDate: Date,
): Result<ContextFilings, SegmentationError> =>
  applyWindow(withRole(filings, "event_report"), {
    kind: "lookback",
    anchor: referenceDate,
    days: windowPolicy.eventLookbackDays,
    start: "inclusive",
    end: "inclusive",
  }).andThen((events) =>
    applyWindow(withRole(filings, "ownership_report"), {
      kind: "lookback",
      anchor: referenceDate,
      days: windowPolicy.ownershipLookbackDays,
      start: "inclusive",
      end: "inclusive",
    }).map((ownership) => ({
      eventFilings: events.filings,
      ownershipFilings: ownership.filings,
    })),
  );

export type PeriodContext = {
  periodEnd: Date;
  proxyStatements: FilingDocument[];
  firstProxyStatement: FilingDocument | null;
  votingResultCandidates: FilingDocument[];
  activistStakeFilings: FilingDocument[];
};

/**
 * Windows measured from the anchor's period end rather than its filing date:
 * proxies 0-120 days after, voting-result event reports 0-180 days after and
 * activist stakes within a year either side.
 */
export const selectPeriodContext = (
  anchor: FilingDocument,
  filings: readonly FilingDocument[],
): Result<PeriodContext, SegmentationError> => {
  const periodEnd = anchor.periodOfReport;
  if (!periodEnd) {
    return err(
      segmentationError(
        "malformed_input",
        `Anchor ${anchor.accessionId} has no period of report for period-relative windows.`,
        { ticker: anchor.ticker, accessionId: anchor.accessionId },
      ),
    );
  }

  const proxies = applyWindow(withRole(filings, "proxy_statement"), {
    kind: "lookahead",
    anchor: periodEnd,
    days: windowPolicy.proxySearchDays,
    start: "inclusive",
    end: "inclusive",
  });
  const votingResults = applyWindow(withRole(filings, "event_report"), {
    kind: "lookahead",
    anchor: periodEnd,
    days: windowPolicy.votingResultSearchDays,
    start: "inclusive",
    end: "inclusive",
  });
  const activistStakes = applyWindow(
    withRole(filings, "activist_stake_report"),
    {
      kind: "around",
      anchor: periodEnd,
      days: windowPolicy.activistStakeDays,
      start: "inclusive",
      end: "inclusive",
    },
  );

  return proxies.andThen((proxyWindow) =>
    votingResults.andThen((votingWindow) =>
      activistStakes.map((activistWindow) => ({
        periodEnd,
        proxyStatements: proxyWindow.filings,
        firstProxyStatement: proxyWindow.filings[0] ?? null,
        votingResultCandidates: votingWindow.filings,
        activistStakeFilings: activistWindow.filings,
      })),
    ),
  );
};

/**
 * Verifies no filing was published after the as-of boundary.
 */
export const assertNoLookahead = (
  filings: readonly FilingDocument[],
  asOf: Date,
): Result<void, SegmentationError> => {
  const leaked = filings.find(
    (filing) => filing.filingDate.getTime() > asOf.getTime(),
  );

  if (leaked) {
    return err(
      segmentationError(
        "ordering_violation",
        `Filing ${leaked.accessionId} (${toIsoDate(leaked.filingDate)}) is after the snapshot as-of date ${toIsoDate(asOf)}.`,
        { accessionId: leaked.accessionId },
      ),
    );
  }

  return ok(undefined);
};
