import { err, ok, type Result } from "neverthrow";
import {
  fromBoundary,
  fromSegmentation,
  type PipelineFailure,
} from "../../core/entities/appError";
import type { ValidatedPagePattern } from "../../core/entities/page";
import type { PagePatternClassifierPort } from "../../core/ports/inboundPorts";
import {
  DEFAULT_SAMPLE_WINDOW,
  parsePatternProposal,
  selectSampleChunk,
  validatePagePattern,
} from "../../core/text/pageSlicer";
import { logger } from "../../shared/logger/logger";
import type { PagePatternRegistry } from "./pagePatternRegistry";

export type PatternDiscoveryRequest = {
  signature: string;
  text: string;
};

export type PatternDiscoveryResult = {
  pattern: ValidatedPagePattern;
  cached: boolean;
};

type Discovery = Promise<Result<PatternDiscoveryResult, PipelineFailure>>;

/**
 * Learns the page-footer pattern of a document layout once and reuses it for
 * every filing that shares the signature. Concurrent requests for an unknown
 * signature share one classifier call.
 */
export class PagePatternDiscoveryService {
  private readonly inFlight = new Map<string, Discovery>();

  constructor(
    private readonly classifier: PagePatternClassifierPort,
    private readonly registry: PagePatternRegistry,
    private readonly sampleWindow: { start: number; end: number } =
      DEFAULT_SAMPLE_WINDOW,
  ) {}

  async discover(request: PatternDiscoveryRequest): Discovery {
    const cached = this.registry.get(request.signature);
    if (cached) {
      return ok({ pattern: cached, cached: true });
    }

    const shared = this.inFlight.get(request.signature);
    if (shared) {
      return shared;
    }

    const discovery = this.learn(request);
    this.inFlight.set(request.signature, discovery);
    try {
      return await discovery;
    } finally {
      this.inFlight.delete(request.signature);
    }
  }

  private async learn(request: PatternDiscoveryRequest): Discovery {
    const sample = selectSampleChunk(request.text, this.sampleWindow);
    if (sample.isErr()) {
      return err(fromSegmentation(sample.error));
    }

    const reply = await this.classifier.proposePagePattern({
      signature: request.signature,
      sample: sample.value,
    });
    if (reply.isErr()) {
      return err(fromBoundary(reply.error));
    }

    const proposal = parsePatternProposal(reply.value);
    const validated = validatePagePattern(proposal, sample.value);
    if (validated.isErr()) {
      logger.warn(
        { signature: request.signature, proposal, reason: validated.error.message },
        "Rejected page pattern proposal",
      );
      return err(fromSegmentation(validated.error));
    }

    const registered = await this.registry.register(
      request.signature,
      validated.value,
    );
    if (registered.isErr()) {
      return err(registered.error);
    }

    logger.info(
      {
        signature: request.signature,
        pattern: registered.value.source,
        samplePages: registered.value.samplePages.length,
      },
      "Registered page pattern",
    );

    return ok({ pattern: registered.value, cached: false });
  }
}
