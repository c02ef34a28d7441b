import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { FilingDocument, FormType } from "../../core/entities/filing";
import { FileSystemFilingCatalog } from "../../infra/catalog/fileSystemFilingCatalog";
import { InMemoryFilingCatalog } from "../../infra/catalog/inMemoryFilingCatalog";
import { SnapshotBatchService } from "./snapshotBatchService";
import { SnapshotCorrelationService } from "./snapshotCorrelationService";

const filing = (
  ticker: string,
  accessionId: string,
  formType: FormType,
  filingDate: string,
  fiscalYear?: number,
): FilingDocument => ({
  ticker,
  formType,
  filingDate: new Date(`${filingDate}T00:00:00.000Z`),
  accessionId,
  savedFiles: [],
  sourcePath: `/filings/${ticker}/${accessionId}`,
  ...(fiscalYear === undefined ? {} : { fiscalYear }),
});

const catalog = new InMemoryFilingCatalog([
  filing("ACME", "acme-k", "10-K", "2023-11-01", 2023),
  filing("ACME", "acme-p", "DEF 14A", "2024-01-15"),
  filing("BOLT", "bolt-k", "10-K", "2023-03-01", 2023),
]);

describe("SnapshotBatchService", () => {
  const service = new SnapshotBatchService(
    new SnapshotCorrelationService(catalog),
  );

  it("aggregates bundle statuses and skipped requests", async () => {
    const outcome = (
      await service.run(
        [
          { ticker: "ACME", fiscalYear: 2023 },
          { ticker: "BOLT", fiscalYear: 2023 },
          { ticker: "CRUX", fiscalYear: 2023 },
          { ticker: "", fiscalYear: 2023 },
        ],
        2,
      )
    )._unsafeUnwrap();

    expect(outcome.counts).toEqual({
      complete: 1,
      secondary_missing: 1,
      anchor_missing: 1,
      malformed_input: 1,
    });
    expect(outcome.succeeded.map((entry) => entry.value.status)).toEqual([
      "complete",
      "secondary_missing",
      "anchor_missing",
    ]);
    expect(outcome.skipped.map((entry) => entry.request.ticker)).toEqual([""]);
  });

  it("rejects a non-positive concurrency", async () => {
    const failure = (await service.run([], 0))._unsafeUnwrapErr();
    expect(failure.code).toBe("malformed_input");
  });
});

describe("SnapshotBatchService over a filesystem catalog", () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await rm(root, { recursive: true, force: true });
      root = undefined;
    }
  });

  it("counts malformed catalog records instead of hiding them", async () => {
    root = await mkdtemp(path.join(tmpdir(), "snapshot-batch-"));
    const dir = path.join(root, "filings", "ACME", "10-K", "2024-02-01_k-1");
    await mkdir(dir, { recursive: true });
    await writeFile(
      path.join(dir, "metadata.json"),
      JSON.stringify({
        ticker: "ACME",
        form: "10-K",
        filing_date: "02/01/2024",
        fiscal_year: 2023,
        accession_number: "k-1",
      }),
    );

    const batch = new SnapshotBatchService(
      new SnapshotCorrelationService(new FileSystemFilingCatalog(root, "filings")),
    );
    const outcome = (
      await batch.run([{ ticker: "ACME", fiscalYear: 2023 }], 1)
    )._unsafeUnwrap();

    expect(outcome.counts).toEqual({ anchor_missing: 1, malformed_input: 1 });
    expect(outcome.succeeded[0]?.value.skippedRecords).toBe(1);
  });
});
