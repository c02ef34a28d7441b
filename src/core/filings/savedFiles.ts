import type { Result } from "neverthrow";
import type { FilingDocument, SavedFile } from "../entities/filing";

export const PRIMARY_DOCUMENT_PURPOSE = "Primary Document";

export const selectPrimaryDocument = (
  filing: FilingDocument,
): SavedFile | null =>
  filing.savedFiles.find((file) => file.purpose === PRIMARY_DOCUMENT_PURPOSE) ??
  null;

const isSegmentDisclosure = (purpose: string): boolean =>
  purpose.includes("segment") &&
  (purpose.includes("revenue") || purpose.includes("information"));

/**
 * Picks the exhibit carrying segment revenue: the first detailed segment
 * disclosure, else the first file whose purpose mentions a segment.
 */
export const selectSegmentTableFile = (
  filing: FilingDocument,
): SavedFile | null => {
  const withPurpose = filing.savedFiles.map((file) => ({
    file,
    purpose: file.purpose.toLowerCase(),
  }));

  const detailed = withPurpose.find(
    ({ purpose }) => isSegmentDisclosure(purpose) && purpose.includes("details"),
  );

  return (
    detailed?.file ??
    withPurpose.find(({ purpose }) => purpose.includes("segment"))?.file ??
    null
  );
};

/**
 * HTML exhibits already converted to markdown tables.
 */
export const tableFileCandidates = (filing: FilingDocument): SavedFile[] =>
  filing.savedFiles.filter(
    (file) => file.documentType === "HTML" && file.name.endsWith(".md"),
  );

export const containsFingerprint = (
  content: string,
  keywords: readonly string[],
): boolean => {
  const haystack = content.toLowerCase();
  return keywords.every((keyword) => haystack.includes(keyword.toLowerCase()));
};

export type FingerprintScan<E> = {
  match: { file: SavedFile; content: string } | null;
  unreadable: Array<{ file: SavedFile; error: E }>;
};

/**
 * Reads table files in saved order and returns the first that mentions every
 * fingerprint keyword. Files that cannot be read are passed over and listed
 * in `unreadable`.
 */
export const findFingerprintTable = async <E>(
  filing: FilingDocument,
  keywords: readonly string[],
  read: (file: SavedFile) => Promise<Result<string, E>>,
): Promise<FingerprintScan<E>> => {
  const unreadable: FingerprintScan<E>["unreadable"] = [];

  for (const file of tableFileCandidates(filing)) {
    const content = await read(file);
    if (content.isErr()) {
      unreadable.push({ file, error: content.error });
      continue;
    }

    if (containsFingerprint(content.value, keywords)) {
      return { match: { file, content: content.value }, unreadable };
    }
  }

  return { match: null, unreadable };
};
