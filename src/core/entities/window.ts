import type { FilingDocument } from "./filing";

export type BoundInclusivity = "inclusive" | "exclusive";

/**
 * A time-bounded window of `days` relative to `anchor`. Both bounds state
 * their inclusivity; nothing is defaulted.
 * - lookback: `[anchor - days, anchor]`
 * - lookahead: `[anchor, anchor + days]`
 * - around: `[anchor - days, anchor + days]`
 */
export type RangeWindowSpec = {
  kind: "lookback" | "lookahead" | "around";
  anchor: Date;
  days: number;
  start: BoundInclusivity;
  end: BoundInclusivity;
};

/**
 * Everything after `anchor`, nearest first, with no upper bound.
 */
export type AfterWindowSpec = {
  kind: "after";
  anchor: Date;
  start: BoundInclusivity;
};

export type FilingWindowSpec = RangeWindowSpec | AfterWindowSpec;

export type WindowBounds = {
  start: Date;
  end: Date | null;
};

/**
 * Filings inside a window, ordered by filing date ascending (nearest first for `after`).
 */
export type FilingWindow = {
  spec: FilingWindowSpec;
  bounds: WindowBounds;
  filings: FilingDocument[];
};
