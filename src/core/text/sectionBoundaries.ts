import { err, ok, type Result } from "neverthrow";
import {
  segmentationError,
  type SegmentationError,
} from "../entities/appError";
import type {
  SectionExtractOptions,
  SectionRule,
  SectionRuleTable,
  SectionSpan,
} from "../entities/section";
import { pickExtremal } from "../ranking/pickExtremal";
import { escapeRegExp, scanMatches } from "./regexScan";
import {
  annualReportSectionRules,
  DEFAULT_SECTION_MIN_LENGTH,
  normalizeSectionKey,
} from "./sectionRules";

// Heading, emphasis, block-quote and table-pipe decoration before the label.
const DECORATION = "[ \\t\\u00a0#>*_|~]*";
const GAP = "[ \\t\\u00a0]*";
// "1" must not match "1A", "10" or "1.01".
const LABEL_GUARD = "(?![0-9a-z]|\\.\\d)";
const TRAILER = "[ \\t\\u00a0.:*_|~\\-\\u2013\\u2014]*(?:[a-z'\\u2019]+)?";

export const buildItemHeaderPattern = (label: string): RegExp =>
  new RegExp(
    `^${DECORATION}item${GAP}${escapeRegExp(label)}${LABEL_GUARD}${TRAILER}`,
    "gim",
  );

const genericItemHeader = new RegExp(
  `^${DECORATION}item${GAP}(\\d+(?:\\.\\d+)?[a-z]?)${LABEL_GUARD}`,
  "gim",
);

const genericStopHeaders = [
  new RegExp(`^${DECORATION}signatures?\\b`, "gim"),
  new RegExp(`^${DECORATION}part${GAP}[ivx]+\\b`, "gim"),
];

type Boundary =
  | { kind: "markers"; patterns: readonly RegExp[] }
  | { kind: "generic" }
  | { kind: "document_end" };

type BoundaryPlan = {
  key: string;
  start: RegExp;
  boundary: Boundary;
  minLength: number;
};

type CompiledRule = {
  rule: SectionRule;
  start: RegExp;
  ends: readonly RegExp[];
};

/**
 * Locates named sections with the longest-block heuristic. Patterns for the
 * rule table are compiled once at construction; the instance is read-only.
 */
export class SectionBoundaryExtractor {
  private readonly compiled: ReadonlyMap<string, CompiledRule>;

  constructor(
    private readonly rules: SectionRuleTable = annualReportSectionRules,
    private readonly defaultMinLength = DEFAULT_SECTION_MIN_LENGTH,
  ) {
    this.compiled = new Map(
      Object.entries(rules).map(([key, rule]) => [
        normalizeSectionKey(key),
        {
          rule,
          start: buildItemHeaderPattern(rule.label),
          ends: rule.endKeys.map((endKey) =>
            buildItemHeaderPattern(this.labelFor(endKey)),
          ),
        },
      ]),
    );
  }

  /**
   * Returns the winning span or `not_found`; never an empty or approximated section.
   */
  extract(
    fullText: string,
    sectionKey: string,
    options: SectionExtractOptions = {},
  ): Result<SectionSpan, SegmentationError> {
    const plan = this.resolvePlan(sectionKey, options);
    if (!Number.isFinite(plan.minLength) || plan.minLength < 0) {
      return err(
        segmentationError(
          "malformed_input",
          `Minimum section length must be a non-negative number, got ${plan.minLength}.`,
          { sectionKey: plan.key },
        ),
      );
    }

    const candidates = this.pairCandidates(fullText, plan);
    const survivors = candidates.filter(
      (candidate) => candidate.length > plan.minLength,
    );

    // Every terminal candidate shares the document end, so the latest start is the body.
    const winner =
      plan.boundary.kind === "document_end"
        ? pickExtremal(survivors, (candidate) => candidate.start, "max")
        : pickExtremal(survivors, (candidate) => candidate.length, "max");

    if (!winner) {
      return err(
        segmentationError(
          "not_found",
          `Section ${plan.key} has no candidate longer than ${plan.minLength} characters.`,
          {
            sectionKey: plan.key,
            candidateCount: candidates.length,
            minLength: plan.minLength,
          },
        ),
      );
    }

    return ok(winner);
  }

  /**
   * Every start match paired with its nearest following end, before length filtering.
   */
  listCandidates(
    fullText: string,
    sectionKey: string,
    options: SectionExtractOptions = {},
  ): SectionSpan[] {
    return this.pairCandidates(
      fullText,
      this.resolvePlan(sectionKey, options),
    );
  }

  private pairCandidates(fullText: string, plan: BoundaryPlan): SectionSpan[] {
    const starts = scanMatches(fullText, plan.start).map((match) => match.index);
    const ends = this.endOffsets(fullText, plan);
    const candidates: SectionSpan[] = [];

    let cursor = 0;
    for (const start of starts) {
      let end: number | undefined;

      if (ends === "document_end") {
        end = fullText.length;
      } else {
        while (cursor < ends.length && (ends[cursor] ?? 0) <= start) {
          cursor += 1;
        }
        end = ends[cursor];
      }

      if (end === undefined || end <= start) {
        continue;
      }

      candidates.push({
        start,
        end,
        length: end - start,
        text: fullText.slice(start, end),
      });
    }

    return candidates;
  }

  private endOffsets(
    fullText: string,
    plan: BoundaryPlan,
  ): number[] | "document_end" {
    const { boundary } = plan;
    if (boundary.kind === "document_end") {
      return "document_end";
    }

    const offsets: number[] = [];

    if (boundary.kind === "markers") {
      boundary.patterns.forEach((pattern) => {
        scanMatches(fullText, pattern).forEach((match) =>
          offsets.push(match.index),
        );
      });
    } else {
      scanMatches(fullText, genericItemHeader).forEach((match) => {
        const label = match.groups[0];
        if (label && normalizeSectionKey(label) !== plan.key) {
          offsets.push(match.index);
        }
      });
      genericStopHeaders.forEach((pattern) => {
        scanMatches(fullText, pattern).forEach((match) =>
          offsets.push(match.index),
        );
      });
    }

    return Array.from(new Set(offsets)).sort((left, right) => left - right);
  }

  private resolvePlan(
    sectionKey: string,
    options: SectionExtractOptions,
  ): BoundaryPlan {
    const key = normalizeSectionKey(sectionKey);
    const compiled = this.compiled.get(key);
    const minLength =
      options.minLength ?? compiled?.rule.minLength ?? this.defaultMinLength;
    const start = compiled?.start ?? buildItemHeaderPattern(key);

    if (options.endKeys) {
      return {
        key,
        start,
        minLength,
        boundary:
          options.endKeys.length === 0
            ? { kind: "document_end" }
            : {
                kind: "markers",
                patterns: options.endKeys.map((endKey) =>
                  buildItemHeaderPattern(this.labelFor(endKey)),
                ),
              },
      };
    }

    if (!compiled) {
      return { key, start, minLength, boundary: { kind: "generic" } };
    }

    return {
      key,
      start,
      minLength,
      boundary:
        compiled.ends.length === 0
          ? { kind: "document_end" }
          : { kind: "markers", patterns: compiled.ends },
    };
  }

  private labelFor(key: string): string {
    const normalized = normalizeSectionKey(key);
    return this.rules[normalized]?.label ?? normalized;
  }
}

const defaultExtractor = new SectionBoundaryExtractor();

/**
 * Extracts a section from an annual report with the default rule table.
 */
export const extractSection = (
  fullText: string,
  sectionKey: string,
  options?: SectionExtractOptions,
): Result<SectionSpan, SegmentationError> =>
  defaultExtractor.extract(fullText, sectionKey, options);
