/**
 * One candidate (or winning) extraction of a named section; offsets index the full document text.
 */
export type SectionSpan = {
  start: number;
  end: number;
  length: number;
  text: string;
};

/**
 * Boundary data for one section label. An empty `endKeys` list means the
 * section runs to the end of the document.
 */
export type SectionRule = Readonly<{
  label: string;
  endKeys: readonly string[];
  minLength: number;
}>;

export type SectionRuleTable = Readonly<Record<string, SectionRule>>;

export type SectionExtractOptions = {
  /** Replaces the rule table's successor list. */
  endKeys?: readonly string[];
  /** Candidates must be strictly longer than this. */
  minLength?: number;
};
