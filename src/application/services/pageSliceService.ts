import { err, ok, type Result } from "neverthrow";
import {
  fromBoundary,
  fromSegmentation,
  segmentationError,
  type PipelineFailure,
} from "../../core/entities/appError";
import type { FilingDocument, SavedFile } from "../../core/entities/filing";
import type { PageBounds, PageSlice, TocEntry } from "../../core/entities/page";
import type { TableBlock } from "../../core/entities/table";
import type {
  FilingContentPort,
  PagePatternClassifierPort,
} from "../../core/ports/inboundPorts";
import {
  findFingerprintTable,
  selectSegmentTableFile,
} from "../../core/filings/savedFiles";
import {
  resolveTocPageRange,
  sliceByPageMarkers,
  TOC_SAMPLE_LENGTH,
} from "../../core/text/pageSlicer";
import { extractTableBlocks } from "../../core/text/tableBlocks";
import { logger } from "../../shared/logger/logger";
import type { PagePatternDiscoveryService } from "./pagePatternDiscoveryService";
import { patternSignature } from "./pagePatternRegistry";
import { readPrimaryDocument } from "./primaryDocument";

export type TableFileResult = {
  file: SavedFile;
  tables: TableBlock[];
};

export type PageSliceResult = {
  bounds: PageBounds;
  slice: PageSlice;
  tables: TableBlock[];
};

/**
 * Slices a filing by printed page numbers: the layout pattern comes from
 * discovery and item page numbers from the table of contents.
 */
export class PageSliceService {
  constructor(
    private readonly content: FilingContentPort,
    private readonly classifier: PagePatternClassifierPort,
    private readonly discovery: PagePatternDiscoveryService,
  ) {}

  async tableOfContents(
    filing: FilingDocument,
  ): Promise<Result<TocEntry[], PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    return this.readToc(text.value);
  }

  /**
   * Slices from the item's first page up to the next item's first page.
   */
  async sliceItem(
    filing: FilingDocument,
    item: string,
  ): Promise<Result<PageSliceResult, PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    const toc = await this.readToc(text.value);
    if (toc.isErr()) {
      return err(toc.error);
    }

    const bounds = resolveTocPageRange(toc.value, item);
    if (bounds.isErr()) {
      return err(fromSegmentation(bounds.error));
    }

    return this.sliceText(filing, text.value, bounds.value);
  }

  async slicePages(
    filing: FilingDocument,
    bounds: PageBounds,
  ): Promise<Result<PageSliceResult, PipelineFailure>> {
    const text = await readPrimaryDocument(this.content, filing);
    if (text.isErr()) {
      return err(text.error);
    }

    return this.sliceText(filing, text.value, bounds);
  }

  /**
   * Tables from the exhibit that carries segment revenue.
   */
  async segmentTables(
    filing: FilingDocument,
  ): Promise<Result<TableFileResult, PipelineFailure>> {
    const file = selectSegmentTableFile(filing);
    if (!file) {
      return err(
        fromSegmentation(
          segmentationError(
            "not_found",
            `Filing ${filing.accessionId} has no saved segment exhibit.`,
            { ticker: filing.ticker, accessionId: filing.accessionId },
          ),
        ),
      );
    }

    const text = await this.content.readSavedFile(filing, file);
    if (text.isErr()) {
      return err(fromBoundary(text.error));
    }

    return ok({ file, tables: extractTableBlocks(text.value) });
  }

  /**
   * Tables from the first markdown exhibit mentioning every keyword;
   * unreadable exhibits are logged and passed over.
   */
  async fingerprintTables(
    filing: FilingDocument,
    keywords: readonly string[],
  ): Promise<TableFileResult | null> {
    const scan = await findFingerprintTable(filing, keywords, (file) =>
      this.content.readSavedFile(filing, file),
    );

    scan.unreadable.forEach(({ file, error }) =>
      logger.warn(
        {
          accessionId: filing.accessionId,
          file: file.name,
          code: error.code,
          reason: error.message,
        },
        "Skipping unreadable exhibit",
      ),
    );

    return scan.match
      ? { file: scan.match.file, tables: extractTableBlocks(scan.match.content) }
      : null;
  }

  private async sliceText(
    filing: FilingDocument,
    text: string,
    bounds: PageBounds,
  ): Promise<Result<PageSliceResult, PipelineFailure>> {
    const signature = this.signatureFor(filing);
    if (signature.isErr()) {
      return err(signature.error);
    }

    const discovered = await this.discovery.discover({
      signature: signature.value,
      text,
    });
    if (discovered.isErr()) {
      return err(discovered.error);
    }

    return sliceByPageMarkers(text, discovered.value.pattern, bounds)
      .map((slice) => ({
        bounds,
        slice,
        tables: extractTableBlocks(slice.text),
      }))
      .mapErr(fromSegmentation);
  }

  private async readToc(
    text: string,
  ): Promise<Result<TocEntry[], PipelineFailure>> {
    const toc = await this.classifier.extractTableOfContents(
      text.slice(0, TOC_SAMPLE_LENGTH),
    );
    if (toc.isErr()) {
      return err(fromBoundary(toc.error));
    }

    return ok(toc.value);
  }

  private signatureFor(
    filing: FilingDocument,
  ): Result<string, PipelineFailure> {
    if (filing.fiscalYear === undefined) {
      return err(
        fromSegmentation(
          segmentationError(
            "malformed_input",
            `Filing ${filing.accessionId} has no fiscal year to key its page layout.`,
            { ticker: filing.ticker, accessionId: filing.accessionId },
          ),
        ),
      );
    }

    return ok(
      patternSignature(filing.ticker, filing.formType, filing.fiscalYear),
    );
  }
}
