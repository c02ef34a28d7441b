import { err, ok, type Result } from "neverthrow";
import {
  fromBoundary,
  fromSegmentation,
  segmentationError,
  type PipelineFailure,
} from "../../core/entities/appError";
import type { FilingDocument, FormType } from "../../core/entities/filing";
import type {
  SnapshotBundle,
  SnapshotRequest,
} from "../../core/entities/snapshot";
import {
  assertNoLookahead,
  selectAnchorFiling,
  selectContextFilings,
  selectPeriodContext,
  selectSecondaryAnchor,
  type PeriodContext,
} from "../../core/filings/filingCorrelation";
import type { FilingCatalogPort } from "../../core/ports/inboundPorts";

const tickerPattern = /^[A-Z][A-Z0-9.-]{0,9}$/;

const snapshotForms: readonly FormType[] = ["10-K", "DEF 14A", "8-K", "4"];
const periodForms: readonly FormType[] = ["10-K", "DEF 14A", "8-K", "SC 13D"];

export type PeriodSnapshot = {
  anchor: FilingDocument;
  period: PeriodContext;
};

const malformed = (message: string, details: Record<string, unknown>) =>
  err(fromSegmentation(segmentationError("malformed_input", message, details)));

/**
 * Assembles point-in-time filing bundles from catalog metadata. Missing
 * filings produce a bundle status, never an error.
 */
export class SnapshotCorrelationService {
  constructor(private readonly catalog: FilingCatalogPort) {}

  async correlate(
    request: SnapshotRequest,
  ): Promise<Result<SnapshotBundle, PipelineFailure>> {
    const validated = this.validateRequest(request);
    if (validated.isErr()) {
      return err(validated.error);
    }
    const { ticker, fiscalYear } = validated.value;

    const listed = await this.catalog.listFilings({
      ticker,
      formTypes: snapshotForms,
    });
    if (listed.isErr()) {
      return err(fromBoundary(listed.error));
    }
    const { filings, skippedRecords } = listed.value;

    const anchor = selectAnchorFiling(filings, fiscalYear);
    if (!anchor) {
      return ok({ status: "anchor_missing", ticker, fiscalYear, skippedRecords });
    }

    const secondary = selectSecondaryAnchor(filings, anchor.filingDate);
    if (secondary.isErr()) {
      return err(fromSegmentation(secondary.error));
    }
    if (!secondary.value) {
      return ok({
        status: "secondary_missing",
        ticker,
        fiscalYear,
        skippedRecords,
        anchor,
        asOf: anchor.filingDate,
      });
    }

    const secondaryAnchor = secondary.value;
    const asOf = secondaryAnchor.filingDate;
    const context = selectContextFilings(filings, asOf);
    if (context.isErr()) {
      return err(fromSegmentation(context.error));
    }

    const { eventFilings, ownershipFilings } = context.value;
    const checked = assertNoLookahead(
      [anchor, secondaryAnchor, ...eventFilings, ...ownershipFilings],
      asOf,
    );
    if (checked.isErr()) {
      return err(fromSegmentation(checked.error));
    }

    return ok({
      status: "complete",
      ticker,
      fiscalYear,
      skippedRecords,
      anchor,
      secondaryAnchor,
      eventFilings,
      ownershipFilings,
      asOf,
    });
  }

  /**
   * Period-end relative windows for the anchor report; `null` when no anchor
   * exists for the year.
   */
  async periodContext(
    request: SnapshotRequest,
  ): Promise<Result<PeriodSnapshot | null, PipelineFailure>> {
    const validated = this.validateRequest(request);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const listed = await this.catalog.listFilings({
      ticker: validated.value.ticker,
      formTypes: periodForms,
    });
    if (listed.isErr()) {
      return err(fromBoundary(listed.error));
    }

    const anchor = selectAnchorFiling(
      listed.value.filings,
      validated.value.fiscalYear,
    );
    if (!anchor) {
      return ok(null);
    }

    return selectPeriodContext(anchor, listed.value.filings)
      .map((period) => ({ anchor, period }))
      .mapErr(fromSegmentation);
  }

  private validateRequest(
    request: SnapshotRequest,
  ): Result<SnapshotRequest, PipelineFailure> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!tickerPattern.test(ticker)) {
      return malformed(`Ticker "${request.ticker}" is not a valid symbol.`, {
        ticker: request.ticker,
      });
    }

    if (!Number.isInteger(request.fiscalYear)) {
      return malformed(
        `Fiscal year must be a whole number, got ${request.fiscalYear}.`,
        { fiscalYear: request.fiscalYear },
      );
    }

    return ok({ ticker, fiscalYear: request.fiscalYear });
  }
}
