import { err, type Result } from "neverthrow";
import {
  fromBoundary,
  fromSegmentation,
  segmentationError,
  type PipelineFailure,
} from "../../core/entities/appError";
import type { FilingDocument } from "../../core/entities/filing";
import { selectPrimaryDocument } from "../../core/filings/savedFiles";
import type { FilingContentPort } from "../../core/ports/inboundPorts";

export const readPrimaryDocument = async (
  content: FilingContentPort,
  filing: FilingDocument,
): Promise<Result<string, PipelineFailure>> => {
  const primary = selectPrimaryDocument(filing);
  if (!primary) {
    return err(
      fromSegmentation(
        segmentationError(
          "not_found",
          `Filing ${filing.accessionId} has no saved primary document.`,
          { ticker: filing.ticker, accessionId: filing.accessionId },
        ),
      ),
    );
  }

  return (await content.readSavedFile(filing, primary)).mapErr(fromBoundary);
};
