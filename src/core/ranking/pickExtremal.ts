export type RankOrder = "max" | "min";

/**
 * Picks the candidate with the extremal key. Ties keep the earliest candidate,
 * so callers control tie-breaking through input order.
 */
export const pickExtremal = <T>(
  candidates: readonly T[],
  key: (candidate: T) => number,
  order: RankOrder,
): T | undefined => {
  let best: T | undefined;
  let bestKey = 0;

  for (const candidate of candidates) {
    const candidateKey = key(candidate);
    if (Number.isNaN(candidateKey)) {
      continue;
    }

    const isBetter =
      best === undefined ||
      (order === "max" ? candidateKey > bestKey : candidateKey < bestKey);

    if (isBetter) {
      best = candidate;
      bestKey = candidateKey;
    }
  }

  return best;
};

/**
 * Returns a copy ordered by key; stable for equal keys.
 */
export const rankBy = <T>(
  candidates: readonly T[],
  key: (candidate: T) => number,
  order: RankOrder,
): T[] =>
  [...candidates].sort((left, right) =>
    order === "max" ? key(right) - key(left) : key(left) - key(right),
  );
