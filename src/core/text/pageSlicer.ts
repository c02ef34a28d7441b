import { err, ok, type Result } from "neverthrow";
import {
  segmentationError,
  type SegmentationError,
} from "../entities/appError";
import {
  brandValidatedPattern,
  type PageBounds,
  type PageSlice,
  type TocEntry,
  type ValidatedPagePattern,
} from "../entities/page";
import { scanMatches } from "./regexScan";
import { normalizeSectionKey } from "./sectionRules";

export const PAGE_PATTERN_FLAGS = "gim";

/** Middle-of-document chunk where running page footers are usually regular. */
export const DEFAULT_SAMPLE_WINDOW = { start: 40_000, end: 60_000 } as const;

/** Tables of contents sit in the opening pages. */
export const TOC_SAMPLE_LENGTH = 15_000;

const integerText = /^\s*\d+\s*$/;

const parsePageNumber = (value: string | undefined): number | null =>
  value !== undefined && integerText.test(value)
    ? Number.parseInt(value, 10)
    : null;

/**
 * Pulls the regex out of a classifier reply: `===regex===` first, then a
 * fenced block, then the whole trimmed reply.
 */
export const parsePatternProposal = (reply: string): string => {
  const delimited = /===([\s\S]*?)===/.exec(reply);
  if (delimited?.[1] !== undefined) {
    return delimited[1].trim();
  }

  const fenced = /```(?:regex)?\s*([\s\S]*?)\s*```/.exec(reply);
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim();
  }

  return reply.trim();
};

/**
 * Rewrites the `(?P<name>` and inline-flag syntax classifiers tend to emit into
 * JavaScript: named groups, named back-references and leading inline flags.
 */
export const normalizePatternSyntax = (pattern: string): string =>
  pattern
    .replace(/^\(\?[aimsux]+\)/, "")
    .replaceAll("(?P<", "(?<")
    .replace(/\(\?P=(\w+)\)/g, "\\k<$1>");

/**
 * Compiles a proposed page-number pattern and requires at least one match in
 * the sample whose first capture group is an integer page number.
 */
export const validatePagePattern = (
  proposal: string,
  sample: string,
): Result<ValidatedPagePattern, SegmentationError> => {
  const source = normalizePatternSyntax(proposal.trim());
  if (!source) {
    return err(
      segmentationError("invalid_pattern", "Proposed page pattern is empty."),
    );
  }

  let compiled: RegExp;
  try {
    compiled = new RegExp(source, PAGE_PATTERN_FLAGS);
  } catch (error) {
    return err(
      segmentationError(
        "invalid_pattern",
        `Proposed page pattern does not compile: ${error instanceof Error ? error.message : String(error)}`,
        { pattern: source },
      ),
    );
  }

  const samplePages = scanMatches(sample, compiled)
    .map((match) => parsePageNumber(match.groups[0]))
    .filter((page): page is number => page !== null);

  if (samplePages.length === 0) {
    return err(
      segmentationError(
        "invalid_pattern",
        `Proposed page pattern found 0 page numbers in the sample.`,
        { pattern: source, sampleLength: sample.length },
      ),
    );
  }

  return ok(brandValidatedPattern(source, PAGE_PATTERN_FLAGS, samplePages));
};

/**
 * Rehydrates a pattern that passed validation before it was persisted. It must
 * still compile; there is no sample to match against.
 */
export const restorePagePattern = (
  source: string,
): Result<ValidatedPagePattern, SegmentationError> => {
  try {
    new RegExp(source, PAGE_PATTERN_FLAGS);
  } catch (error) {
    return err(
      segmentationError(
        "invalid_pattern",
        `Stored page pattern does not compile: ${error instanceof Error ? error.message : String(error)}`,
        { pattern: source },
      ),
    );
  }

  return ok(brandValidatedPattern(source, PAGE_PATTERN_FLAGS, []));
};

/**
 * Picks the sample chunk for pattern discovery. A window past the end of a
 * short document slides back so it still ends at the last character.
 */
export const selectSampleChunk = (
  text: string,
  window: { start: number; end: number } = DEFAULT_SAMPLE_WINDOW,
): Result<string, SegmentationError> => {
  if (window.start < 0 || window.start >= window.end) {
    return err(
      segmentationError(
        "ordering_violation",
        `Sample window start (${window.start}) must be non-negative and before its end (${window.end}).`,
      ),
    );
  }

  if (window.start >= text.length) {
    const width = window.end - window.start;
    return ok(text.slice(Math.max(0, text.length - width)));
  }

  return ok(text.slice(window.start, window.end));
};

/**
 * Maps each page number to the end offset of its marker. A page seen twice
 * keeps its last occurrence.
 */
export const buildPageMap = (
  text: string,
  pattern: ValidatedPagePattern,
): Map<number, number> => {
  const pageMap = new Map<number, number>();

  for (const match of scanMatches(text, new RegExp(pattern.source, pattern.flags))) {
    const page = parsePageNumber(match.groups[0]);
    if (page !== null) {
      pageMap.set(page, match.end);
    }
  }

  return pageMap;
};

const markerOffset = (
  pageMap: ReadonlyMap<number, number>,
  page: number | undefined,
  fallback: number,
  role: "start" | "end",
): Result<number, SegmentationError> => {
  if (page === undefined) {
    return ok(fallback);
  }

  const offset = pageMap.get(page);
  if (offset === undefined) {
    return err(
      segmentationError(
        "not_found",
        `${role === "start" ? "Start" : "End"} page marker ${page} not found in document.`,
        { page, role },
      ),
    );
  }

  return ok(offset);
};

/**
 * Slices `[startPage, endPage)` using marker end offsets. A page that is given
 * must exist; there is no nearest-page fallback.
 */
export const slicePages = (
  text: string,
  pageMap: ReadonlyMap<number, number>,
  bounds: PageBounds,
): Result<PageSlice, SegmentationError> =>
  markerOffset(pageMap, bounds.startPage, 0, "start").andThen((start) =>
    markerOffset(pageMap, bounds.endPage, text.length, "end").andThen(
      (end): Result<PageSlice, SegmentationError> => {
        if (start >= end) {
          return err(
            segmentationError(
              "ordering_violation",
              `Start index (${start}) is not before end index (${end}).`,
              { start, end, ...bounds },
            ),
          );
        }

        return ok({ start, end, text: text.slice(start, end) });
      },
    ),
  );

export const sliceByPageMarkers = (
  text: string,
  pattern: ValidatedPagePattern,
  bounds: PageBounds,
): Result<PageSlice, SegmentationError> =>
  slicePages(text, buildPageMap(text, pattern), bounds);

/**
 * Converts a table-of-contents item into page-footer markers: content that
 * starts on page N begins after the footer of page N - 1. The last item has
 * no successor and runs to the end of the document.
 */
export const resolveTocPageRange = (
  toc: readonly TocEntry[],
  item: string,
): Result<PageBounds, SegmentationError> => {
  const target = normalizeSectionKey(item);
  const index = toc.findIndex(
    (entry) => normalizeSectionKey(entry.item) === target,
  );
  const entry = toc[index];

  if (index === -1 || !entry) {
    return err(
      segmentationError(
        "not_found",
        `Item ${target} is not listed in the table of contents.`,
        { item: target, tocSize: toc.length },
      ),
    );
  }

  const startPage = parsePageNumber(entry.page);
  if (startPage === null) {
    return err(
      segmentationError(
        "malformed_input",
        `Table of contents page "${entry.page}" for item ${target} is not a number.`,
      ),
    );
  }

  const bounds: PageBounds = startPage > 1 ? { startPage: startPage - 1 } : {};

  const next = toc[index + 1];
  if (!next) {
    return ok(bounds);
  }

  const nextPage = parsePageNumber(next.page);
  if (nextPage === null) {
    return err(
      segmentationError(
        "malformed_input",
        `Table of contents page "${next.page}" for item ${normalizeSectionKey(next.item)} is not a number.`,
      ),
    );
  }

  return ok({ ...bounds, endPage: nextPage - 1 });
};
