const validatedPagePattern: unique symbol = Symbol("ValidatedPagePattern");

/**
 * A page-number regex that compiled and matched the sample it was proposed for.
 * Produced by `validatePagePattern`, or by `restorePagePattern` for entries
 * that were validated before they were persisted.
 */
export type ValidatedPagePattern = Readonly<{
  source: string;
  flags: string;
  samplePages: readonly number[];
  [validatedPagePattern]: true;
}>;

export const brandValidatedPattern = (
  source: string,
  flags: string,
  samplePages: readonly number[],
): ValidatedPagePattern => ({
  source,
  flags,
  samplePages,
  [validatedPagePattern]: true,
});

/**
 * One row of a filing's table of contents as proposed by the classifier.
 */
export type TocEntry = {
  item: string;
  description: string;
  page: string;
};

/**
 * Page markers to slice between. An omitted start means the beginning of the
 * text; an omitted end means its end.
 */
export type PageBounds = {
  startPage?: number;
  endPage?: number;
};

export type PageSlice = {
  start: number;
  end: number;
  text: string;
};
