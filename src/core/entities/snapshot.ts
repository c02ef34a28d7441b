import type { PipelineFailure } from "./appError";
import type { FilingDocument } from "./filing";

export type SnapshotRequest = {
  ticker: string;
  fiscalYear: number;
};

/**
 * Point-in-time view of one company's filings for a fiscal year. Later stages
 * only run when the earlier anchor exists. `skippedRecords` counts catalog
 * records the view could not consider because their metadata was malformed.
 */
export type SnapshotBundle =
  | {
      status: "anchor_missing";
      ticker: string;
      fiscalYear: number;
      skippedRecords: number;
    }
  | {
      status: "secondary_missing";
      ticker: string;
      fiscalYear: number;
      skippedRecords: number;
      anchor: FilingDocument;
      asOf: Date;
    }
  | {
      status: "complete";
      ticker: string;
      fiscalYear: number;
      skippedRecords: number;
      anchor: FilingDocument;
      secondaryAnchor: FilingDocument;
      eventFilings: FilingDocument[];
      ownershipFilings: FilingDocument[];
      asOf: Date;
    };

export type BatchSkip<TRequest> = {
  request: TRequest;
  failure: PipelineFailure;
};

/**
 * Aggregate of a batch run; `counts` is keyed by outcome (bundle status or failure code).
 */
export type BatchOutcome<TRequest, TValue> = {
  succeeded: Array<{ request: TRequest; value: TValue }>;
  skipped: Array<BatchSkip<TRequest>>;
  counts: Record<string, number>;
};
