import type { TableBlock } from "../entities/table";

export type TableContextBudget = {
  preChars: number;
  postChars: number;
  preLines: number;
  postLines: number;
};

export const DEFAULT_TABLE_CONTEXT: TableContextBudget = {
  preChars: 200,
  postChars: 100,
  preLines: 20,
  postLines: 10,
};

const isTableLine = (line: string): boolean => {
  const trimmed = line.trim();
  return trimmed.startsWith("|") && trimmed.endsWith("|");
};

const splitRow = (line: string): string[] =>
  line
    .trim()
    .replace(/^\|+|\|+$/g, "")
    .split("|")
    .map((cell) => cell.trim());

/**
 * Collects contiguous runs of `|...|` lines as raw grids with the prose around
 * them. Single-row runs (usually stray separator lines) are dropped.
 */
export const extractTableBlocks = (
  text: string,
  budget: TableContextBudget = DEFAULT_TABLE_CONTEXT,
): TableBlock[] => {
  if (!text) {
    return [];
  }

  const lines = text.split("\n");
  const blocks: TableBlock[] = [];

  let index = 0;
  while (index < lines.length) {
    if (!isTableLine(lines[index] ?? "")) {
      index += 1;
      continue;
    }

    const blockStart = index;
    const grid: string[][] = [];
    while (index < lines.length && isTableLine(lines[index] ?? "")) {
      grid.push(splitRow(lines[index] ?? ""));
      index += 1;
    }

    if (grid.length <= 1) {
      continue;
    }

    const before = lines
      .slice(Math.max(0, blockStart - budget.preLines), blockStart)
      .join("\n");
    const after = lines.slice(index, index + budget.postLines).join("\n");

    blocks.push({
      grid,
      preContext: budget.preChars > 0 ? before.slice(-budget.preChars) : "",
      postContext: after.slice(0, budget.postChars),
    });
  }

  return blocks;
};
