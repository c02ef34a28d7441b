import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import {
  formFolders,
  formTypes,
  isFormType,
  type FilingDocument,
  type FormType,
  type SavedFile,
} from "../../core/entities/filing";
import { parseIsoDate } from "../../core/filings/calendar";
import type {
  FilingCatalogPort,
  FilingContentPort,
  FilingListRequest,
  FilingListResult,
} from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

export const METADATA_FILE_NAME = "metadata.json";

const metadataSchema = z.object({
  ticker: z.string().min(1),
  form: z.string(),
  filing_date: z.string(),
  period_of_report: z.string().nullish(),
  fiscal_year: z.union([z.number(), z.string()]).nullish(),
  accession_number: z.string().min(1),
  saved_files: z
    .array(
      z.object({
        saved_as: z.string().min(1),
        purpose: z.string().default(""),
        document_type: z.string().default(""),
      }),
    )
    .default([]),
});

type FilingMetadata = z.infer<typeof metadataSchema>;

const fiscalYearPattern = /^\d{4}$/;

/**
 * Integer years and four-digit strings count; anything else is left absent.
 */
const toFiscalYear = (value: FilingMetadata["fiscal_year"]): number | undefined => {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }

  if (typeof value === "string" && fiscalYearPattern.test(value.trim())) {
    return Number(value.trim());
  }

  return undefined;
};

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Reads filings materialized as
 * `<root>/<dir>/<TICKER>/<form folder>/<YYYY-MM-DD>_<accession>/metadata.json`.
 */
export class FileSystemFilingCatalog implements FilingCatalogPort, FilingContentPort {
  private readonly baseDir: string;

  constructor(root: string, dirName: string) {
    this.baseDir = path.resolve(root, dirName);
  }

  async listFilings(
    request: FilingListRequest,
  ): Promise<Result<FilingListResult, AppBoundaryError>> {
    const ticker = request.ticker.trim().toUpperCase();
    const forms = request.formTypes ?? formTypes;
    const filings: FilingDocument[] = [];
    let skippedRecords = 0;

    for (const form of forms) {
      const folder = path.join(this.baseDir, ticker, formFolders[form]);
      const entries = await this.listDirectories(folder);
      if (entries.isErr()) {
        return err(entries.error);
      }

      for (const entry of entries.value) {
        const sourcePath = path.join(folder, entry);
        const filing = await this.readMetadata(sourcePath, form);
        if (filing.isErr()) {
          return err(filing.error);
        }

        if (filing.value) {
          filings.push(filing.value);
        } else {
          skippedRecords += 1;
        }
      }
    }

    filings.sort(
      (left, right) => left.filingDate.getTime() - right.filingDate.getTime(),
    );

    return ok({ filings, skippedRecords });
  }

  async readSavedFile(
    filing: FilingDocument,
    file: SavedFile,
  ): Promise<Result<string, AppBoundaryError>> {
    if (path.basename(file.name) !== file.name) {
      return err(
        this.failure(
          "content",
          "malformed_response",
          `Saved file name "${file.name}" points outside its filing folder.`,
        ),
      );
    }

    const filePath = path.join(filing.sourcePath, file.name);
    try {
      return ok(await readFile(filePath, "utf-8"));
    } catch (error) {
      return err(
        this.failure(
          "content",
          "io_error",
          `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          error,
        ),
      );
    }
  }

  private async listDirectories(
    folder: string,
  ): Promise<Result<string[], AppBoundaryError>> {
    try {
      const entries = await readdir(folder, { withFileTypes: true });
      return ok(
        entries
          .filter((entry) => entry.isDirectory())
          .map((entry) => entry.name)
          .sort(),
      );
    } catch (error) {
      if (isMissing(error)) {
        return ok([]);
      }

      return err(
        this.failure(
          "catalog",
          "io_error",
          `Failed to list ${folder}: ${error instanceof Error ? error.message : String(error)}`,
          error,
        ),
      );
    }
  }

  /**
   * `null` marks a record that is missing or fails validation; it is skipped, not fatal.
   */
  private async readMetadata(
    sourcePath: string,
    folderForm: FormType,
  ): Promise<Result<FilingDocument | null, AppBoundaryError>> {
    const metadataPath = path.join(sourcePath, METADATA_FILE_NAME);

    let raw: string;
    try {
      raw = await readFile(metadataPath, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        logger.debug({ metadataPath }, "Filing folder has no metadata");
        return ok(null);
      }

      return err(
        this.failure(
          "catalog",
          "io_error",
          `Failed to read ${metadataPath}: ${error instanceof Error ? error.message : String(error)}`,
          error,
        ),
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      logger.warn({ metadataPath }, "Skipping metadata that is not JSON");
      return ok(null);
    }

    const parsed = metadataSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn(
        { metadataPath, issues: parsed.error.issues.map((issue) => issue.message) },
        "Skipping metadata with unexpected shape",
      );
      return ok(null);
    }

    return ok(this.toFiling(parsed.data, sourcePath, folderForm, metadataPath));
  }

  private toFiling(
    metadata: FilingMetadata,
    sourcePath: string,
    folderForm: FormType,
    metadataPath: string,
  ): FilingDocument | null {
    const form = metadata.form.trim();
    const filingDate = parseIsoDate(metadata.filing_date);
    if (!isFormType(form) || form !== folderForm || !filingDate) {
      logger.warn(
        { metadataPath, form, filingDate: metadata.filing_date },
        "Skipping metadata with unknown form or filing date",
      );
      return null;
    }

    const periodOfReport = metadata.period_of_report
      ? parseIsoDate(metadata.period_of_report)
      : null;
    const fiscalYear = toFiscalYear(metadata.fiscal_year);

    return {
      ticker: metadata.ticker.trim().toUpperCase(),
      formType: form,
      filingDate,
      ...(periodOfReport ? { periodOfReport } : {}),
      ...(fiscalYear === undefined ? {} : { fiscalYear }),
      accessionId: metadata.accession_number,
      savedFiles: metadata.saved_files.map((file) => ({
        name: file.saved_as,
        purpose: file.purpose,
        documentType: file.document_type,
      })),
      sourcePath,
    };
  }

  private failure(
    source: "catalog" | "content",
    code: AppBoundaryError["code"],
    message: string,
    cause?: unknown,
  ): AppBoundaryError {
    return {
      source,
      code,
      provider: "filesystem",
      message,
      retryable: false,
      ...(cause === undefined ? {} : { cause }),
    };
  }
}
