/**
 * A raw pipe-delimited block. Rows keep their own cell counts; headers and
 * merged cells are left for the downstream schema-aware step.
 */
export type TableBlock = {
  grid: string[][];
  preContext: string;
  postContext: string;
};
