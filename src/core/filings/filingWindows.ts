import { err, ok, type Result } from "neverthrow";
import {
  segmentationError,
  type SegmentationError,
} from "../entities/appError";
import type { FilingDocument } from "../entities/filing";
import type {
  BoundInclusivity,
  FilingWindow,
  FilingWindowSpec,
  WindowBounds,
} from "../entities/window";
import { rankBy } from "../ranking/pickExtremal";
import { addDays, toIsoDate } from "./calendar";

/**
 * Window lengths used when assembling snapshots. Event disclosures stay
 * relevant longer than individual trading disclosures.
 */
export const windowPolicy = {
  eventLookbackDays: 365,
  ownershipLookbackDays: 180,
  proxySearchDays: 120,
  votingResultSearchDays: 180,
  activistStakeDays: 365,
} as const;

export const windowBounds = (
  spec: FilingWindowSpec,
): Result<WindowBounds, SegmentationError> => {
  if (Number.isNaN(spec.anchor.getTime())) {
    return err(
      segmentationError("malformed_input", "Window anchor date is invalid."),
    );
  }

  if (spec.kind === "after") {
    return ok({ start: spec.anchor, end: null });
  }

  if (!Number.isInteger(spec.days) || spec.days < 0) {
    return err(
      segmentationError(
        "ordering_violation",
        `Window length must be a non-negative whole number of days, got ${spec.days}; its start would fall after its end.`,
        { kind: spec.kind, anchor: toIsoDate(spec.anchor), days: spec.days },
      ),
    );
  }

  switch (spec.kind) {
    case "lookback":
      return ok({ start: addDays(spec.anchor, -spec.days), end: spec.anchor });
    case "lookahead":
      return ok({ start: spec.anchor, end: addDays(spec.anchor, spec.days) });
    case "around":
      return ok({
        start: addDays(spec.anchor, -spec.days),
        end: addDays(spec.anchor, spec.days),
      });
  }
};

const afterStart = (
  value: Date,
  bound: Date,
  inclusivity: BoundInclusivity,
): boolean =>
  inclusivity === "inclusive"
    ? value.getTime() >= bound.getTime()
    : value.getTime() > bound.getTime();

const beforeEnd = (
  value: Date,
  bound: Date | null,
  inclusivity: BoundInclusivity,
): boolean => {
  if (bound === null) {
    return true;
  }

  return inclusivity === "inclusive"
    ? value.getTime() <= bound.getTime()
    : value.getTime() < bound.getTime();
};

/**
 * Keeps the filings whose filing date falls inside the window, ordered by date ascending.
 */
export const applyWindow = (
  filings: readonly FilingDocument[],
  spec: FilingWindowSpec,
): Result<FilingWindow, SegmentationError> =>
  windowBounds(spec).map((bounds) => {
    const endInclusivity = spec.kind === "after" ? "inclusive" : spec.end;
    const inside = filings.filter(
      (filing) =>
        afterStart(filing.filingDate, bounds.start, spec.start) &&
        beforeEnd(filing.filingDate, bounds.end, endInclusivity),
    );

    return {
      spec,
      bounds,
      filings: rankBy(inside, (filing) => filing.filingDate.getTime(), "min"),
    };
  });
