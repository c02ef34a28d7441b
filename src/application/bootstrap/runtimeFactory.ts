import { PagePatternDiscoveryService } from "../services/pagePatternDiscoveryService";
import { PagePatternRegistry } from "../services/pagePatternRegistry";
import { PageSliceService } from "../services/pageSliceService";
import { SectionExtractionService } from "../services/sectionExtractionService";
import { SnapshotBatchService } from "../services/snapshotBatchService";
import { SnapshotCorrelationService } from "../services/snapshotCorrelationService";
import { env } from "../../shared/config/env";
import { FileSystemFilingCatalog } from "../../infra/catalog/fileSystemFilingCatalog";
import { OllamaPagePatternClassifier } from "../../infra/llm/ollamaPagePatternClassifier";
import { JsonFilePagePatternStore } from "../../infra/patterns/jsonFilePagePatternStore";
import { SystemClock } from "../../infra/system/systemPorts";

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = async () => {
  const clock = new SystemClock();
  const catalog = new FileSystemFilingCatalog(
    env.FILINGS_ROOT,
    env.FILINGS_DIR_NAME,
  );
  const classifier = new OllamaPagePatternClassifier(
    env.OLLAMA_BASE_URL,
    env.OLLAMA_CHAT_MODEL,
    env.OLLAMA_CHAT_TIMEOUT_MS,
  );
  const patternStore = new JsonFilePagePatternStore(env.PAGE_PATTERN_CACHE_PATH);

  const registry = await PagePatternRegistry.load(patternStore, clock);
  if (registry.isErr()) {
    throw new Error(
      `Page pattern store could not be loaded: ${registry.error.message}`,
    );
  }

  const correlationService = new SnapshotCorrelationService(catalog);
  const batchService = new SnapshotBatchService(correlationService);
  const sectionService = new SectionExtractionService(catalog, {
    ...(env.SECTION_MIN_LENGTH === undefined
      ? {}
      : { minLengthOverride: env.SECTION_MIN_LENGTH }),
    keywordWindowSize: env.KEYWORD_WINDOW_SIZE,
  });
  const discoveryService = new PagePatternDiscoveryService(
    classifier,
    registry.value,
  );
  const pageSliceService = new PageSliceService(
    catalog,
    classifier,
    discoveryService,
  );

  return {
    catalog,
    registry: registry.value,
    correlationService,
    batchService,
    sectionService,
    discoveryService,
    pageSliceService,
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
