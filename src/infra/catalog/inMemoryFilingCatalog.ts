import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { FilingDocument, SavedFile } from "../../core/entities/filing";
import type {
  FilingCatalogPort,
  FilingContentPort,
  FilingListRequest,
  FilingListResult,
} from "../../core/ports/inboundPorts";

/**
 * Catalog and content store held in memory; keyed by `sourcePath/name`.
 */
export class InMemoryFilingCatalog implements FilingCatalogPort, FilingContentPort {
  private readonly contents = new Map<string, string>();

  constructor(private readonly filings: readonly FilingDocument[] = []) {}

  withContent(filing: FilingDocument, fileName: string, text: string): this {
    this.contents.set(`${filing.sourcePath}/${fileName}`, text);
    return this;
  }

  async listFilings(
    request: FilingListRequest,
  ): Promise<Result<FilingListResult, AppBoundaryError>> {
    const ticker = request.ticker.toUpperCase();
    const forms = request.formTypes;

    return ok({
      filings: this.filings.filter(
        (filing) =>
          filing.ticker === ticker &&
          (forms === undefined || forms.includes(filing.formType)),
      ),
      skippedRecords: 0,
    });
  }

  async readSavedFile(
    filing: FilingDocument,
    file: SavedFile,
  ): Promise<Result<string, AppBoundaryError>> {
    const text = this.contents.get(`${filing.sourcePath}/${file.name}`);
    if (text === undefined) {
      return err({
        source: "content",
        code: "io_error",
        provider: "memory",
        message: `No content stored for ${file.name} of ${filing.accessionId}.`,
        retryable: false,
      });
    }

    return ok(text);
  }
}
