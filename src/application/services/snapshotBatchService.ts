import { err, ok, type Result } from "neverthrow";
import {
  failureCode,
  segmentationError,
  type SegmentationError,
} from "../../core/entities/appError";
import type {
  BatchOutcome,
  SnapshotBundle,
  SnapshotRequest,
} from "../../core/entities/snapshot";
import { logger } from "../../shared/logger/logger";
import { collectOutcome, runBounded } from "./batchOutcome";
import type { SnapshotCorrelationService } from "./snapshotCorrelationService";

export type SnapshotBatchOutcome = BatchOutcome<SnapshotRequest, SnapshotBundle>;

/**
 * Correlates many ticker/year pairs; one bad pair never aborts the batch.
 * Malformed catalog records behind successful bundles are added to the
 * `malformed_input` count.
 */
export class SnapshotBatchService {
  constructor(
    private readonly correlation: Pick<SnapshotCorrelationService, "correlate">,
  ) {}

  async run(
    requests: readonly SnapshotRequest[],
    concurrency: number,
  ): Promise<Result<SnapshotBatchOutcome, SegmentationError>> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      return err(
        segmentationError(
          "malformed_input",
          `Batch concurrency must be a positive whole number, got ${concurrency}.`,
        ),
      );
    }

    const startedAt = Date.now();
    const results = await runBounded(requests, concurrency, async (request) => {
      const result = await this.correlation.correlate(request);
      if (result.isErr()) {
        logger.warn(
          {
            ticker: request.ticker,
            fiscalYear: request.fiscalYear,
            code: failureCode(result.error),
            reason: result.error.message,
          },
          "Snapshot skipped",
        );
      }
      return result;
    });

    const outcome = collectOutcome(
      requests,
      results,
      (bundle) => bundle.status,
    );

    const skippedRecords = outcome.succeeded.reduce(
      (total, { value }) => total + value.skippedRecords,
      0,
    );
    if (skippedRecords > 0) {
      outcome.counts.malformed_input =
        (outcome.counts.malformed_input ?? 0) + skippedRecords;
    }

    logger.info(
      {
        requested: requests.length,
        succeeded: outcome.succeeded.length,
        skipped: outcome.skipped.length,
        skippedRecords,
        counts: outcome.counts,
        durationMs: Date.now() - startedAt,
      },
      "Snapshot batch finished",
    );

    return ok(outcome);
  }
}
