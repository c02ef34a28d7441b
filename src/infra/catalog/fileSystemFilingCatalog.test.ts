import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileSystemFilingCatalog } from "./fileSystemFilingCatalog";

let root: string;

const writeFiling = async (
  folder: string,
  entry: string,
  metadata: unknown,
  files: Record<string, string> = {},
): Promise<string> => {
  const dir = path.join(root, "filings", "ACME", folder, entry);
  await mkdir(dir, { recursive: true });
  await writeFile(
    path.join(dir, "metadata.json"),
    typeof metadata === "string" ? metadata : JSON.stringify(metadata),
  );
  await Promise.all(
    Object.entries(files).map(([name, text]) =>
      writeFile(path.join(dir, name), text),
    ),
  );
  return dir;
};

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), "filing-catalog-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("FileSystemFilingCatalog", () => {
  it("lists valid filings per form folder and counts skipped records", async () => {
    const annualDir = await writeFiling("10-K", "2024-02-20_0000000000-24-000001", {
      ticker: "acme",
      form: "10-K",
      filing_date: "2024-02-20",
      period_of_report: "2023-12-31",
      fiscal_year: "2023",
      accession_number: "0000000000-24-000001",
      saved_files: [
        { saved_as: "primary.md", purpose: "Primary Document", document_type: "HTML" },
      ],
    });
    await writeFiling("Proxy_Statement", "2024-03-15_0000000000-24-000002", {
      ticker: "ACME",
      form: "DEF 14A",
      filing_date: "2024-03-15",
      fiscal_year: "FY2023",
      accession_number: "0000000000-24-000002",
    });
    await writeFiling("Proxy_Statement", "2024-03-16_broken", "{not json");
    await writeFiling("Proxy_Statement", "2024-03-17_bad-date", {
      ticker: "ACME",
      form: "DEF 14A",
      filing_date: "2024-02-30",
      accession_number: "bad-date",
    });

    const catalog = new FileSystemFilingCatalog(root, "filings");
    const result = (
      await catalog.listFilings({ ticker: "acme", formTypes: ["10-K", "DEF 14A", "8-K"] })
    )._unsafeUnwrap();

    expect(result.skippedRecords).toBe(2);
    expect(result.filings.map((filing) => filing.accessionId)).toEqual([
      "0000000000-24-000001",
      "0000000000-24-000002",
    ]);

    const [annual, proxy] = result.filings;
    expect(annual).toEqual({
      ticker: "ACME",
      formType: "10-K",
      filingDate: new Date("2024-02-20T00:00:00.000Z"),
      periodOfReport: new Date("2023-12-31T00:00:00.000Z"),
      fiscalYear: 2023,
      accessionId: "0000000000-24-000001",
      savedFiles: [
        { name: "primary.md", purpose: "Primary Document", documentType: "HTML" },
      ],
      sourcePath: annualDir,
    });
    expect(proxy?.fiscalYear).toBeUndefined();
    expect(proxy?.savedFiles).toEqual([]);
  });

  it("returns nothing for a ticker without folders", async () => {
    const catalog = new FileSystemFilingCatalog(root, "filings");
    const result = (await catalog.listFilings({ ticker: "NONE" }))._unsafeUnwrap();
    expect(result).toEqual({ filings: [], skippedRecords: 0 });
  });

  it("reads saved files beside the metadata", async () => {
    await writeFiling(
      "10-K",
      "2024-02-20_0000000000-24-000001",
      {
        ticker: "ACME",
        form: "10-K",
        filing_date: "2024-02-20",
        fiscal_year: 2023,
        accession_number: "0000000000-24-000001",
        saved_files: [{ saved_as: "primary.md", purpose: "Primary Document" }],
      },
      { "primary.md": "Item 1. Business" },
    );
    const catalog = new FileSystemFilingCatalog(root, "filings");
    const [filing] = (
      await catalog.listFilings({ ticker: "ACME", formTypes: ["10-K"] })
    )._unsafeUnwrap().filings;
    if (!filing) {
      throw new Error("expected one filing");
    }

    const [primary] = filing.savedFiles;
    if (!primary) {
      throw new Error("expected one saved file");
    }
    expect((await catalog.readSavedFile(filing, primary))._unsafeUnwrap()).toBe(
      "Item 1. Business",
    );

    const missing = (
      await catalog.readSavedFile(filing, { ...primary, name: "absent.md" })
    )._unsafeUnwrapErr();
    expect(missing).toMatchObject({ source: "content", code: "io_error" });

    const escaping = (
      await catalog.readSavedFile(filing, { ...primary, name: "../metadata.json" })
    )._unsafeUnwrapErr();
    expect(escaping.code).toBe("malformed_response");
  });
});
