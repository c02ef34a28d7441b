import { err } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { FilingDocument, FormType } from "../../core/entities/filing";
import type { FilingCatalogPort } from "../../core/ports/inboundPorts";
import { InMemoryFilingCatalog } from "../../infra/catalog/inMemoryFilingCatalog";
import { SnapshotCorrelationService } from "./snapshotCorrelationService";

const day = (iso: string): Date => new Date(`${iso}T00:00:00.000Z`);

const filing = (
  accessionId: string,
  formType: FormType,
  filingDate: string,
  extra: Partial<Pick<FilingDocument, "fiscalYear" | "periodOfReport">> = {},
): FilingDocument => ({
  ticker: "ACME",
  formType,
  filingDate: day(filingDate),
  accessionId,
  savedFiles: [],
  sourcePath: `/filings/ACME/${accessionId}`,
  ...extra,
});

const ids = (filings: readonly FilingDocument[]): string[] =>
  filings.map((item) => item.accessionId);

const history = [
  filing("k-2023", "10-K", "2023-11-01", {
    fiscalYear: 2023,
    periodOfReport: day("2023-09-30"),
  }),
  filing("p-2023-06", "DEF 14A", "2023-06-01"),
  filing("p-2024-01", "DEF 14A", "2024-01-15"),
  filing("p-2024-03", "DEF 14A", "2024-03-01"),
  filing("8k-2023-02", "8-K", "2023-02-01"),
  filing("8k-2023-12", "8-K", "2023-12-05"),
  filing("8k-2024-02", "8-K", "2024-02-01"),
  filing("f4-2023-05", "4", "2023-05-01"),
  filing("f4-2023-10", "4", "2023-10-10"),
  filing("13d-2023-08", "SC 13D", "2023-08-08"),
];

describe("SnapshotCorrelationService", () => {
  it("builds a complete bundle as of the secondary anchor", async () => {
    const service = new SnapshotCorrelationService(
      new InMemoryFilingCatalog(history),
    );

    const bundle = (
      await service.correlate({ ticker: "acme", fiscalYear: 2023 })
    )._unsafeUnwrap();

    expect(bundle.status).toBe("complete");
    if (bundle.status !== "complete") {
      return;
    }
    expect(bundle.ticker).toBe("ACME");
    expect(bundle.anchor.accessionId).toBe("k-2023");
    expect(bundle.secondaryAnchor.accessionId).toBe("p-2024-01");
    expect(bundle.asOf).toEqual(day("2024-01-15"));
    expect(ids(bundle.eventFilings)).toEqual(["8k-2023-02", "8k-2023-12"]);
    expect(ids(bundle.ownershipFilings)).toEqual(["f4-2023-10"]);
  });

  it("stops at the anchor when no later proxy exists", async () => {
    const service = new SnapshotCorrelationService(
      new InMemoryFilingCatalog(
        history.filter((item) => item.formType !== "DEF 14A"),
      ),
    );

    const bundle = (
      await service.correlate({ ticker: "ACME", fiscalYear: 2023 })
    )._unsafeUnwrap();

    expect(bundle).toEqual({
      status: "secondary_missing",
      ticker: "ACME",
      fiscalYear: 2023,
      skippedRecords: 0,
      anchor: history[0],
      asOf: day("2023-11-01"),
    });
  });

  it("reports a missing anchor without an error", async () => {
    const service = new SnapshotCorrelationService(
      new InMemoryFilingCatalog(history),
    );

    const bundle = (
      await service.correlate({ ticker: "ACME", fiscalYear: 2021 })
    )._unsafeUnwrap();

    expect(bundle).toEqual({
      status: "anchor_missing",
      ticker: "ACME",
      fiscalYear: 2021,
      skippedRecords: 0,
    });
  });

  it("rejects blank tickers and fractional years", async () => {
    const service = new SnapshotCorrelationService(new InMemoryFilingCatalog());

    const blank = (
      await service.correlate({ ticker: "  ", fiscalYear: 2023 })
    )._unsafeUnwrapErr();
    const fractional = (
      await service.correlate({ ticker: "ACME", fiscalYear: 2023.5 })
    )._unsafeUnwrapErr();

    expect(blank.kind === "segmentation" && blank.code).toBe("malformed_input");
    expect(fractional.kind === "segmentation" && fractional.code).toBe(
      "malformed_input",
    );
  });

  it("passes catalog failures through", async () => {
    const catalog: FilingCatalogPort = {
      listFilings: async () =>
        err({
          source: "catalog",
          code: "io_error",
          provider: "filesystem",
          message: "EACCES",
          retryable: false,
        }),
    };

    const failure = (
      await new SnapshotCorrelationService(catalog).correlate({
        ticker: "ACME",
        fiscalYear: 2023,
      })
    )._unsafeUnwrapErr();

    expect(failure.kind === "boundary" && failure.source).toBe("catalog");
  });

  it("collects period-end windows for the anchor", async () => {
    const service = new SnapshotCorrelationService(
      new InMemoryFilingCatalog(history),
    );

    const snapshot = (
      await service.periodContext({ ticker: "ACME", fiscalYear: 2023 })
    )._unsafeUnwrap();

    expect(snapshot?.anchor.accessionId).toBe("k-2023");
    expect(ids(snapshot?.period.proxyStatements ?? [])).toEqual(["p-2024-01"]);
    expect(ids(snapshot?.period.votingResultCandidates ?? [])).toEqual([
      "8k-2023-12",
      "8k-2024-02",
    ]);
    expect(ids(snapshot?.period.activistStakeFilings ?? [])).toEqual([
      "13d-2023-08",
    ]);
  });
});
