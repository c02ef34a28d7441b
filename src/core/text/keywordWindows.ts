import { err, ok, type Result } from "neverthrow";
import {
  segmentationError,
  type SegmentationError,
} from "../entities/appError";

export type TextRange = { start: number; end: number };

/**
 * Collects every case-insensitive literal hit offset for the keywords, sorted.
 */
export const findKeywordOffsets = (
  text: string,
  keywords: readonly string[],
): number[] => {
  const haystack = text.toLowerCase();
  const offsets: number[] = [];

  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    if (!needle) {
      continue;
    }

    let from = 0;
    while (from <= haystack.length) {
      const index = haystack.indexOf(needle, from);
      if (index === -1) {
        break;
      }
      offsets.push(index);
      from = index + needle.length;
    }
  }

  return offsets.sort((left, right) => left - right);
};

/**
 * Builds clipped `[hit - size, hit + size]` windows and merges the ones that overlap or touch.
 */
export const keywordWindowRanges = (
  text: string,
  keywords: readonly string[],
  windowSize: number,
): Result<TextRange[], SegmentationError> => {
  if (!Number.isFinite(windowSize) || windowSize < 0) {
    return err(
      segmentationError(
        "ordering_violation",
        `Window size must be a non-negative number, got ${windowSize}.`,
      ),
    );
  }

  const merged: TextRange[] = [];

  for (const offset of findKeywordOffsets(text, keywords)) {
    const range = {
      start: Math.max(0, offset - windowSize),
      end: Math.min(text.length, offset + windowSize),
    };
    const current = merged.at(-1);

    if (current && range.start <= current.end) {
      current.end = Math.max(current.end, range.end);
    } else {
      merged.push(range);
    }
  }

  return ok(merged);
};

/**
 * Renders merged keyword windows as `... slice ...` lines in document order.
 * Returns an empty string when no keyword occurs.
 */
export const mergeKeywordWindows = (
  text: string,
  keywords: readonly string[],
  windowSize: number,
): Result<string, SegmentationError> =>
  keywordWindowRanges(text, keywords, windowSize).map((ranges) =>
    ranges
      .map((range) => `... ${text.slice(range.start, range.end)} ...`)
      .join("\n"),
  );
