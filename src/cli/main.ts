import { Command, InvalidArgumentError } from "commander";
import { createRuntime, type Runtime } from "../application/bootstrap/runtimeFactory";
import type { TableFileResult } from "../application/services/pageSliceService";
import { patternSignature } from "../application/services/pagePatternRegistry";
import { readPrimaryDocument } from "../application/services/primaryDocument";
import type { FilingDocument } from "../core/entities/filing";
import type { PageBounds } from "../core/entities/page";
import type { SnapshotRequest } from "../core/entities/snapshot";
import { selectAnchorFiling } from "../core/filings/filingCorrelation";
import { env, parseTickerList } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import {
  formatBatchReport,
  formatCandidates,
  formatFailure,
  formatPeriodReport,
  formatSection,
  formatSnapshotReport,
  formatTables,
} from "./formatters";

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected a whole number.");
  }
  return parsed;
};

const parseList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

const fail = (message: string): void => {
  console.error(message);
  process.exitCode = 1;
};

/**
 * Finds the annual report a per-document command works on.
 */
const resolveAnnualReport = async (
  runtime: Runtime,
  ticker: string,
  fiscalYear: number,
): Promise<FilingDocument | null> => {
  const listed = await runtime.catalog.listFilings({
    ticker,
    formTypes: ["10-K"],
  });
  if (listed.isErr()) {
    fail(`catalog:${listed.error.code}: ${listed.error.message}`);
    return null;
  }

  const anchor = selectAnchorFiling(listed.value.filings, fiscalYear);
  if (!anchor) {
    fail(`No annual report for ${ticker.toUpperCase()} tagged FY${fiscalYear}.`);
  }
  return anchor;
};

/**
 * Defines a single command surface so every operation runs through the same runtime wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("filing-segmenter")
    .description("Section, table and point-in-time selection over saved regulatory filings");

  cli
    .command("snapshot")
    .description("Correlate the anchor report, proxy and context filings for one fiscal year")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--year <year>", "Fiscal year", parseInteger)
    .option("--json", "Print the bundle as JSON")
    .action(async (opts: { ticker: string; year: number; json?: boolean }) => {
      const runtime = await createRuntime();
      const bundle = await runtime.correlationService.correlate({
        ticker: opts.ticker,
        fiscalYear: opts.year,
      });
      if (bundle.isErr()) {
        fail(formatFailure(bundle.error));
        return;
      }

      console.log(
        opts.json
          ? JSON.stringify(bundle.value, null, 2)
          : formatSnapshotReport(bundle.value),
      );
    });

  cli
    .command("batch")
    .description("Correlate every ticker/year pair with bounded concurrency")
    .requiredOption("--tickers <tickers>", "Comma-separated ticker symbols")
    .requiredOption("--years <years>", "Comma-separated fiscal years")
    .option(
      "--concurrency <n>",
      "Pairs correlated at once",
      parseInteger,
      env.BATCH_CONCURRENCY,
    )
    .action(
      async (opts: { tickers: string; years: string; concurrency: number }) => {
        const runtime = await createRuntime();
        const years = parseList(opts.years).map(Number);
        const requests: SnapshotRequest[] = parseTickerList(opts.tickers).flatMap(
          (ticker) => years.map((fiscalYear) => ({ ticker, fiscalYear })),
        );

        const outcome = await runtime.batchService.run(requests, opts.concurrency);
        if (outcome.isErr()) {
          fail(`${outcome.error.code}: ${outcome.error.message}`);
          return;
        }

        console.log(
          formatBatchReport(
            outcome.value,
            (request) => `${request.ticker}/${request.fiscalYear}`,
          ),
        );
      },
    );

  cli
    .command("section")
    .description("Extract annual-report items from the primary document")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--year <year>", "Fiscal year", parseInteger)
    .requiredOption("--items <items>", "Comma-separated item labels, e.g. 1A,7")
    .option("--min-length <n>", "Minimum section length", parseInteger)
    .option("--end-keys <keys>", "Comma-separated item labels that end the section")
    .option("--candidates", "List every paired candidate instead of the winner")
    .action(
      async (opts: {
        ticker: string;
        year: number;
        items: string;
        minLength?: number;
        endKeys?: string;
        candidates?: boolean;
      }) => {
        const runtime = await createRuntime();
        const filing = await resolveAnnualReport(runtime, opts.ticker, opts.year);
        if (!filing) {
          return;
        }

        const options = {
          ...(opts.minLength === undefined ? {} : { minLength: opts.minLength }),
          ...(opts.endKeys === undefined ? {} : { endKeys: parseList(opts.endKeys) }),
        };

        if (opts.candidates) {
          for (const item of parseList(opts.items)) {
            const listed = await runtime.sectionService.candidates(filing, item, options);
            if (listed.isErr()) {
              fail(formatFailure(listed.error));
              return;
            }
            console.log(formatCandidates(item, listed.value));
          }
          return;
        }

        const outcome = await runtime.sectionService.extractMany(
          filing,
          parseList(opts.items),
          options,
        );
        if (outcome.isErr()) {
          fail(formatFailure(outcome.error));
          return;
        }

        outcome.value.succeeded.forEach(({ request, value }) =>
          console.log(`${formatSection(request, value)}\n`),
        );
        console.log(formatBatchReport(outcome.value, (key) => `item ${key}`));
      },
    );

  cli
    .command("windows")
    .description("Print keyword context windows, or period-end filing windows without keywords")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--year <year>", "Fiscal year", parseInteger)
    .option("--keywords <keywords>", "Comma-separated literal keywords")
    .option("--size <n>", "Characters on each side of a hit", parseInteger)
    .action(
      async (opts: { ticker: string; year: number; keywords?: string; size?: number }) => {
        const runtime = await createRuntime();

        if (!opts.keywords) {
          const period = await runtime.correlationService.periodContext({
            ticker: opts.ticker,
            fiscalYear: opts.year,
          });
          if (period.isErr()) {
            fail(formatFailure(period.error));
            return;
          }
          if (!period.value) {
            fail(`No annual report for ${opts.ticker.toUpperCase()} tagged FY${opts.year}.`);
            return;
          }
          console.log(formatPeriodReport(period.value));
          return;
        }

        const filing = await resolveAnnualReport(runtime, opts.ticker, opts.year);
        if (!filing) {
          return;
        }

        const rendered = await runtime.sectionService.keywordContext(
          filing,
          parseList(opts.keywords),
          opts.size,
        );
        if (rendered.isErr()) {
          fail(formatFailure(rendered.error));
          return;
        }
        console.log(rendered.value || "(no keyword hits)");
      },
    );

  cli
    .command("tables")
    .description("Slice an item by printed page numbers and list its tables")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--year <year>", "Fiscal year", parseInteger)
    .option("--item <item>", "Item label looked up in the table of contents")
    .option("--from-page <n>", "Footer page marker to start after", parseInteger)
    .option("--to-page <n>", "Footer page marker to end at", parseInteger)
    .option("--segment", "Read tables from the segment revenue exhibit instead")
    .option(
      "--fingerprint <keywords>",
      "Read tables from the first exhibit containing every keyword instead",
    )
    .action(
      async (opts: {
        ticker: string;
        year: number;
        item?: string;
        fromPage?: number;
        toPage?: number;
        segment?: boolean;
        fingerprint?: string;
      }) => {
        const runtime = await createRuntime();
        const filing = await resolveAnnualReport(runtime, opts.ticker, opts.year);
        if (!filing) {
          return;
        }

        if (opts.segment || opts.fingerprint) {
          let exhibit: TableFileResult | null;
          if (opts.fingerprint) {
            exhibit = await runtime.pageSliceService.fingerprintTables(
              filing,
              parseList(opts.fingerprint),
            );
          } else {
            const segment = await runtime.pageSliceService.segmentTables(filing);
            if (segment.isErr()) {
              fail(formatFailure(segment.error));
              return;
            }
            exhibit = segment.value;
          }
          if (!exhibit) {
            fail(`No exhibit of ${filing.accessionId} contains every fingerprint keyword.`);
            return;
          }

          console.log(`Exhibit: ${exhibit.file.name} (${exhibit.file.purpose})`);
          console.log(formatTables(exhibit.tables) || "(no tables)");
          return;
        }

        const bounds: PageBounds = {
          ...(opts.fromPage === undefined ? {} : { startPage: opts.fromPage }),
          ...(opts.toPage === undefined ? {} : { endPage: opts.toPage }),
        };
        const sliced = opts.item
          ? await runtime.pageSliceService.sliceItem(filing, opts.item)
          : await runtime.pageSliceService.slicePages(filing, bounds);
        if (sliced.isErr()) {
          fail(formatFailure(sliced.error));
          return;
        }

        logger.info(
          {
            bounds: sliced.value.bounds,
            start: sliced.value.slice.start,
            end: sliced.value.slice.end,
            tables: sliced.value.tables.length,
          },
          "Sliced filing",
        );
        console.log(formatTables(sliced.value.tables) || "(no tables)");
      },
    );

  cli
    .command("discover-pattern")
    .description("Learn and store the page-footer pattern for a filing layout")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--year <year>", "Fiscal year", parseInteger)
    .action(async (opts: { ticker: string; year: number }) => {
      const runtime = await createRuntime();
      const filing = await resolveAnnualReport(runtime, opts.ticker, opts.year);
      if (!filing) {
        return;
      }

      const text = await readPrimaryDocument(runtime.catalog, filing);
      if (text.isErr()) {
        fail(formatFailure(text.error));
        return;
      }

      const discovered = await runtime.discoveryService.discover({
        signature: patternSignature(filing.ticker, filing.formType, opts.year),
        text: text.value,
      });
      if (discovered.isErr()) {
        fail(formatFailure(discovered.error));
        return;
      }

      console.log(
        `${discovered.value.cached ? "Cached" : "Registered"} pattern: ${discovered.value.pattern.source}`,
      );
    });

  cli
    .command("status")
    .description("Report runtime configuration")
    .action(async () => {
      const runtime = await createRuntime();

      logger.info(
        {
          filingsRoot: env.FILINGS_ROOT,
          filingsDir: env.FILINGS_DIR_NAME,
          patternCache: env.PAGE_PATTERN_CACHE_PATH,
          registeredPatterns: runtime.registry.size,
          sectionMinLengthOverride: env.SECTION_MIN_LENGTH ?? null,
          keywordWindowSize: env.KEYWORD_WINDOW_SIZE,
          batchConcurrency: env.BATCH_CONCURRENCY,
          ollama: env.OLLAMA_BASE_URL,
          ollamaModel: env.OLLAMA_CHAT_MODEL,
          logLevel: env.LOG_LEVEL ?? logger.level,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
