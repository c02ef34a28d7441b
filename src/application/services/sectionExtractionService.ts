import { err, ok, type Result } from "neverthrow";
import {
  fromSegmentation,
  type PipelineFailure,
} from "../../core/entities/appError";
import type { FilingDocument } from "../../core/entities/filing";
import type {
  SectionExtractOptions,
  SectionSpan,
} from "../../core/entities/section";
import type { BatchOutcome } from "../../core/entities/snapshot";
import type { FilingContentPort } from "../../core/ports/inboundPorts";
import { mergeKeywordWindows } from "../../core/text/keywordWindows";
import { SectionBoundaryExtractor } from "../../core/text/sectionBoundaries";
import { normalizeSectionKey } from "../../core/text/sectionRules";
import { collectOutcome } from "./batchOutcome";
import { readPrimaryDocument } from "./primaryDocument";

export type SectionExtractionSettings = {
  /** Applied to every key unless the call passes its own minimum. */
  minLengthOverride?: number;
  keywordWindowSize: number;
};

/**
 * Section and keyword-context extraction over a filing's primary document.
 */
export class SectionExtractionService {
  constructor(
    private readonly content: FilingContentPort,
    private readonly settings: SectionExtractionSettings,
    private readonly extractor = new SectionBoundaryExtractor(),
  ) {}

  /**
   * Reads the document once and extracts each key independently; a key that
   * cannot be located is reported, not fatal.
   */
  async extractMany(
    filing: FilingDocument,
    sectionKeys: readonly string[],
    options: SectionExtractOptions = {},
  ): Promise<Result<BatchOutcome<string, SectionSpan>, PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    const keys = Array.from(new Set(sectionKeys.map(normalizeSectionKey)));
    const resolved = this.resolveOptions(options);
    const results = keys.map((key) =>
      this.extractor
        .extract(text.value, key, resolved)
        .mapErr(fromSegmentation),
    );

    return ok(collectOutcome(keys, results, () => "extracted"));
  }

  async extractOne(
    filing: FilingDocument,
    sectionKey: string,
    options: SectionExtractOptions = {},
  ): Promise<Result<SectionSpan, PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    return this.extractor
      .extract(text.value, sectionKey, this.resolveOptions(options))
      .mapErr(fromSegmentation);
  }

  /**
   * Every paired candidate before length filtering.
   */
  async candidates(
    filing: FilingDocument,
    sectionKey: string,
    options: SectionExtractOptions = {},
  ): Promise<Result<SectionSpan[], PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    return ok(
      this.extractor.listCandidates(
        text.value,
        sectionKey,
        this.resolveOptions(options),
      ),
    );
  }

  async keywordContext(
    filing: FilingDocument,
    keywords: readonly string[],
    windowSize = this.settings.keywordWindowSize,
  ): Promise<Result<string, PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    return mergeKeywordWindows(text.value, keywords, windowSize).mapErr(
      fromSegmentation,
    );
  }

  private resolveOptions(options: SectionExtractOptions): SectionExtractOptions {
    const minLength = options.minLength ?? this.settings.minLengthOverride;
    return minLength === undefined ? options : { ...options, minLength };
  }
}
