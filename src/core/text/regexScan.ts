export type ScanMatch = {
  index: number;
  end: number;
  groups: readonly (string | undefined)[];
};

/**
 * Enumerates every match of `pattern` without touching the caller's `lastIndex`.
 * Zero-width matches advance by one character so the scan always terminates.
 */
export const scanMatches = (text: string, pattern: RegExp): ScanMatch[] => {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const scanner = new RegExp(pattern.source, flags);
  const matches: ScanMatch[] = [];

  let match = scanner.exec(text);
  while (match !== null) {
    matches.push({
      index: match.index,
      end: match.index + match[0].length,
      groups: match.slice(1),
    });

    if (match[0].length === 0) {
      scanner.lastIndex += 1;
    }
    match = scanner.exec(text);
  }

  return matches;
};

export const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
