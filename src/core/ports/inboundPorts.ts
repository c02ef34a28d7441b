import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { FilingDocument, FormType, SavedFile } from "../entities/filing";
import type { TocEntry } from "../entities/page";

export type FilingListRequest = {
  ticker: string;
  formTypes?: readonly FormType[];
};

export type FilingListResult = {
  filings: FilingDocument[];
  /** Metadata records that failed validation and were left out. */
  skippedRecords: number;
};

export interface FilingCatalogPort {
  listFilings(
    request: FilingListRequest,
  ): Promise<Result<FilingListResult, AppBoundaryError>>;
}

export interface FilingContentPort {
  readSavedFile(
    filing: FilingDocument,
    file: SavedFile,
  ): Promise<Result<string, AppBoundaryError>>;
}

export type PagePatternPrompt = {
  signature: string;
  sample: string;
};

/**
 * Model-backed helpers for document layouts that rules cannot anticipate.
 * Replies are untrusted; callers parse and validate them.
 */
export interface PagePatternClassifierPort {
  proposePagePattern(
    prompt: PagePatternPrompt,
  ): Promise<Result<string, AppBoundaryError>>;
  extractTableOfContents(
    tocText: string,
  ): Promise<Result<TocEntry[], AppBoundaryError>>;
}
