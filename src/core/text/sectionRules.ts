import type { SectionRuleTable } from "../entities/section";

/**
 * Annual-report items. Item N ends at its lettered variants or N+1; a lettered
 * variant ends at the next letter or N+1. Item 16 is the last item.
 */
export const annualReportSectionRules: SectionRuleTable = {
  "1": { label: "1", endKeys: ["1A", "1B", "1C", "2"], minLength: 1_000 },
  "1A": { label: "1A", endKeys: ["1B", "1C", "2"], minLength: 1_000 },
  "1B": { label: "1B", endKeys: ["1C", "2"], minLength: 100 },
  "1C": { label: "1C", endKeys: ["2"], minLength: 100 },
  "2": { label: "2", endKeys: ["3"], minLength: 100 },
  "3": { label: "3", endKeys: ["4"], minLength: 100 },
  "4": { label: "4", endKeys: ["5"], minLength: 100 },
  "5": { label: "5", endKeys: ["6"], minLength: 500 },
  "6": { label: "6", endKeys: ["7"], minLength: 100 },
  "7": { label: "7", endKeys: ["7A", "8"], minLength: 1_000 },
  "7A": { label: "7A", endKeys: ["8"], minLength: 500 },
  "8": { label: "8", endKeys: ["9", "9A", "9B", "9C"], minLength: 1_000 },
  "9": { label: "9", endKeys: ["9A", "9B", "9C", "10"], minLength: 100 },
  "9A": { label: "9A", endKeys: ["9B", "9C", "10"], minLength: 500 },
  "9B": { label: "9B", endKeys: ["9C", "10"], minLength: 100 },
  "9C": { label: "9C", endKeys: ["10"], minLength: 100 },
  "10": { label: "10", endKeys: ["11"], minLength: 100 },
  "11": { label: "11", endKeys: ["12"], minLength: 100 },
  "12": { label: "12", endKeys: ["13"], minLength: 100 },
  "13": { label: "13", endKeys: ["14"], minLength: 100 },
  "14": { label: "14", endKeys: ["15"], minLength: 100 },
  "15": { label: "15", endKeys: ["16"], minLength: 500 },
  "16": { label: "16", endKeys: [], minLength: 100 },
};

/** Threshold for labels that have no rule (event-report items, ad hoc labels). */
export const DEFAULT_SECTION_MIN_LENGTH = 1_000;

export const normalizeSectionKey = (key: string): string =>
  key
    .trim()
    .replace(/^item[\s.]*/i, "")
    .toUpperCase();
