import type { Result } from "neverthrow";
import { failureCode, type PipelineFailure } from "../../core/entities/appError";
import type { BatchOutcome } from "../../core/entities/snapshot";

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results keep input order.
 */
export const runBounded = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item !== undefined) {
        results[index] = await worker(item, index);
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
};

/**
 * Folds per-item results into one outcome. Successes are counted under the
 * key `outcomeKey` gives them, failures under their failure code.
 */
export const collectOutcome = <TRequest, TValue>(
  requests: readonly TRequest[],
  results: ReadonlyArray<Result<TValue, PipelineFailure>>,
  outcomeKey: (value: TValue) => string,
): BatchOutcome<TRequest, TValue> => {
  const outcome: BatchOutcome<TRequest, TValue> = {
    succeeded: [],
    skipped: [],
    counts: {},
  };

  results.forEach((result, index) => {
    const request = requests[index];
    if (request === undefined) {
      return;
    }

    const key = result.isOk()
      ? outcomeKey(result.value)
      : failureCode(result.error);
    outcome.counts[key] = (outcome.counts[key] ?? 0) + 1;

    if (result.isOk()) {
      outcome.succeeded.push({ request, value: result.value });
    } else {
      outcome.skipped.push({ request, failure: result.error });
    }
  });

  return outcome;
};
