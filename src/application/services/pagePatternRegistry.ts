import { err, ok, type Result } from "neverthrow";
import {
  fromBoundary,
  fromSegmentation,
  segmentationError,
  type AppBoundaryError,
  type PipelineFailure,
} from "../../core/entities/appError";
import type { FormType } from "../../core/entities/filing";
import type { ValidatedPagePattern } from "../../core/entities/page";
import type {
  ClockPort,
  PagePatternStorePort,
} from "../../core/ports/outboundPorts";
import { restorePagePattern } from "../../core/text/pageSlicer";
import { logger } from "../../shared/logger/logger";

/**
 * Filings from the same issuer, form and year share a page-footer layout.
 */
export const patternSignature = (
  ticker: string,
  formType: FormType,
  fiscalYear: number,
): string => `${ticker.trim().toUpperCase()}:${formType}:${fiscalYear}`;

type Registration = Promise<Result<ValidatedPagePattern, PipelineFailure>>;

/**
 * Append-only map from layout signature to a validated page pattern. Entries
 * reach the store before they become visible to readers; registrations for
 * one signature run one at a time.
 */
export class PagePatternRegistry {
  private readonly patterns: Map<string, ValidatedPagePattern>;
  private readonly pending = new Map<string, Registration>();

  private constructor(
    private readonly store: PagePatternStorePort,
    private readonly clock: ClockPort,
    seed: ReadonlyMap<string, ValidatedPagePattern>,
  ) {
    this.patterns = new Map(seed);
  }

  /**
   * Seeds a registry from the store. Stored entries that no longer compile are
   * skipped with a warning.
   */
  static async load(
    store: PagePatternStorePort,
    clock: ClockPort,
  ): Promise<Result<PagePatternRegistry, AppBoundaryError>> {
    const stored = await store.loadAll();
    if (stored.isErr()) {
      return err(stored.error);
    }

    const seed = new Map<string, ValidatedPagePattern>();
    for (const entry of stored.value) {
      const restored = restorePagePattern(entry.source);
      if (restored.isErr()) {
        logger.warn(
          { signature: entry.signature, reason: restored.error.message },
          "Skipping stored page pattern",
        );
        continue;
      }

      if (!seed.has(entry.signature)) {
        seed.set(entry.signature, restored.value);
      }
    }

    return ok(new PagePatternRegistry(store, clock, seed));
  }

  get(signature: string): ValidatedPagePattern | undefined {
    return this.patterns.get(signature);
  }

  get size(): number {
    return this.patterns.size;
  }

  signatures(): string[] {
    return [...this.patterns.keys()].sort();
  }

  /**
   * Registering the same pattern twice is a no-op; a different pattern for a
   * known signature is rejected.
   */
  async register(
    signature: string,
    pattern: ValidatedPagePattern,
  ): Registration {
    const inFlight = this.pending.get(signature);
    if (inFlight) {
      await inFlight;
      return this.register(signature, pattern);
    }

    const existing = this.patterns.get(signature);
    if (existing) {
      if (existing.source === pattern.source) {
        return ok(existing);
      }

      return err(
        fromSegmentation(
          segmentationError(
            "invalid_pattern",
            `Signature ${signature} already has a different page pattern.`,
            { signature, registered: existing.source, proposed: pattern.source },
          ),
        ),
      );
    }

    const registration = this.persist(signature, pattern);
    this.pending.set(signature, registration);
    try {
      return await registration;
    } finally {
      this.pending.delete(signature);
    }
  }

  private async persist(
    signature: string,
    pattern: ValidatedPagePattern,
  ): Registration {
    const saved = await this.store.save({
      signature,
      source: pattern.source,
      registeredAt: this.clock.now().toISOString(),
    });
    if (saved.isErr()) {
      return err(fromBoundary(saved.error));
    }

    this.patterns.set(signature, pattern);
    return ok(pattern);
  }
}
