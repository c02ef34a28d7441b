import { err, ok } from "neverthrow";
import { describe, expect, it, vi } from "vitest";
import type { FilingDocument, SavedFile } from "../entities/filing";
import {
  findFingerprintTable,
  selectPrimaryDocument,
  selectSegmentTableFile,
} from "./savedFiles";

const filingWith = (savedFiles: SavedFile[]): FilingDocument => ({
  ticker: "ACME",
  formType: "10-K",
  filingDate: new Date("2024-02-20T00:00:00.000Z"),
  fiscalYear: 2023,
  accessionId: "0000000000-24-000001",
  savedFiles,
  sourcePath: "/filings/ACME/10-K/2024-02-20_0000000000-24-000001",
});

const file = (
  name: string,
  purpose: string,
  documentType = "HTML",
): SavedFile => ({ name, purpose, documentType });

describe("selectPrimaryDocument", () => {
  it("returns the file saved as the primary document", () => {
    const filing = filingWith([
      file("R2.md", "Balance Sheet"),
      file("primary.md", "Primary Document"),
    ]);
    expect(selectPrimaryDocument(filing)?.name).toBe("primary.md");
  });

  it("returns null when none is saved", () => {
    expect(selectPrimaryDocument(filingWith([]))).toBeNull();
  });
});

describe("selectSegmentTableFile", () => {
  it("prefers the detailed segment revenue table", () => {
    const filing = filingWith([
      file("R40.md", "Segment Information"),
      file("R88.md", "Segment Information - Revenue by Segment (Details)"),
    ]);
    expect(selectSegmentTableFile(filing)?.name).toBe("R88.md");
  });

  it("falls back to the first file mentioning a segment", () => {
    expect(
      selectSegmentTableFile(
        filingWith([
          file("R40.md", "Segment Information"),
          file("R41.md", "Segment revenue"),
        ]),
      )?.name,
    ).toBe("R40.md");

    expect(
      selectSegmentTableFile(
        filingWith([
          file("R10.md", "Segment Reporting Policy"),
          file("R40.md", "Segment Information"),
        ]),
      )?.name,
    ).toBe("R10.md");

    expect(
      selectSegmentTableFile(filingWith([file("R12.md", "Segment Reporting Policy")]))
        ?.name,
    ).toBe("R12.md");
  });

  it("returns null without segment files", () => {
    expect(
      selectSegmentTableFile(filingWith([file("R2.md", "Balance Sheet")])),
    ).toBeNull();
  });
});

describe("findFingerprintTable", () => {
  const filing = filingWith([
    file("exhibit.txt", "Exhibit", "TEXT"),
    file("R4.md", "Income Statement"),
    file("R5.md", "Comprehensive Income"),
  ]);

  it("returns the first markdown table containing every keyword", async () => {
    const contents: Record<string, string> = {
      "R4.md": "| Net Sales | 10 |\n| Cost of sales | 4 |",
      "R5.md": "| Net sales | 10 |\n| Operating income | 3 |",
    };
    const read = vi.fn(async (saved: SavedFile) =>
      ok<string, string>(contents[saved.name] ?? ""),
    );

    const result = await findFingerprintTable(
      filing,
      ["net sales", "operating INCOME"],
      read,
    );

    expect(result.match?.file.name).toBe("R5.md");
    expect(result.unreadable).toEqual([]);
    expect(read).toHaveBeenCalledTimes(2);
  });

  it("returns null when no table matches", async () => {
    const result = await findFingerprintTable(filing, ["goodwill"], async () =>
      ok<string, string>("| Revenue | 1 |"),
    );
    expect(result.match).toBeNull();
  });

  it("passes over unreadable files and keeps scanning", async () => {
    const result = await findFingerprintTable(filing, ["segment"], async (saved) =>
      saved.name === "R4.md"
        ? err<string, string>("missing")
        : ok<string, string>("| Segment | Revenue |"),
    );

    expect(result.match?.file.name).toBe("R5.md");
    expect(result.unreadable).toEqual([
      { file: file("R4.md", "Income Statement"), error: "missing" },
    ]);
  });
});
