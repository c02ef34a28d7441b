import { describe, expect, it } from "vitest";
import { pickExtremal, rankBy } from "./pickExtremal";

describe("pickExtremal", () => {
  const spans = [
    { id: "toc", length: 40 },
    { id: "body", length: 18_000 },
    { id: "header", length: 18_000 },
    { id: "xref", length: 12 },
  ];

  it("returns the maximum and keeps the earliest on ties", () => {
    expect(pickExtremal(spans, (span) => span.length, "max")?.id).toBe("body");
  });

  it("returns the minimum", () => {
    expect(pickExtremal(spans, (span) => span.length, "min")?.id).toBe("xref");
  });

  it("returns undefined for no candidates", () => {
    expect(pickExtremal([], () => 1, "max")).toBeUndefined();
  });

  it("skips candidates whose key is not a number", () => {
    const picked = pickExtremal(
      [{ at: Number.NaN }, { at: 3 }, { at: 7 }],
      (item) => item.at,
      "min",
    );
    expect(picked).toEqual({ at: 3 });
  });
});

describe("rankBy", () => {
  it("orders ascending without mutating the input", () => {
    const input = [3, 1, 2];
    expect(rankBy(input, (value) => value, "min")).toEqual([1, 2, 3]);
    expect(input).toEqual([3, 1, 2]);
  });

  it("orders descending", () => {
    expect(rankBy([3, 1, 2], (value) => value, "max")).toEqual([3, 2, 1]);
  });
});
