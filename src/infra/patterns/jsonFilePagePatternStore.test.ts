import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonFilePagePatternStore } from "./jsonFilePagePatternStore";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), "page-patterns-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("JsonFilePagePatternStore", () => {
  it("starts empty when the file does not exist", async () => {
    const store = new JsonFilePagePatternStore(path.join(root, "patterns.json"));
    expect((await store.loadAll())._unsafeUnwrap()).toEqual([]);
  });

  it("persists entries across instances, creating the directory", async () => {
    const filePath = path.join(root, "nested", "patterns.json");
    const store = new JsonFilePagePatternStore(filePath);

    await Promise.all([
      store.save({
        signature: "ACME:10-K:2023",
        source: "^Page (\\d+)$",
        registeredAt: "2026-01-05T00:00:00.000Z",
      }),
      store.save({
        signature: "BOLT:10-K:2023",
        source: "^- (\\d+) -$",
        registeredAt: "2026-01-05T00:00:01.000Z",
      }),
    ]);

    const reloaded = new JsonFilePagePatternStore(filePath);
    const entries = (await reloaded.loadAll())._unsafeUnwrap();
    expect(entries.map((entry) => entry.signature)).toEqual([
      "ACME:10-K:2023",
      "BOLT:10-K:2023",
    ]);

    const written: unknown = JSON.parse(await readFile(filePath, "utf-8"));
    expect(written).toMatchObject({ version: 1 });
  });

  it("never replaces a stored signature", async () => {
    const filePath = path.join(root, "patterns.json");
    const store = new JsonFilePagePatternStore(filePath);
    const entry = {
      signature: "ACME:10-K:2023",
      source: "^Page (\\d+)$",
      registeredAt: "2026-01-05T00:00:00.000Z",
    };

    const [first, repeat, different] = await Promise.all([
      store.save(entry),
      store.save(entry),
      store.save({ ...entry, source: "^(\\d+)$" }),
    ]);

    expect(first.isOk()).toBe(true);
    expect(repeat.isOk()).toBe(true);
    expect(different._unsafeUnwrapErr().code).toBe("conflict");
    expect((await store.loadAll())._unsafeUnwrap()).toEqual([entry]);
  });

  it("reports a corrupt store instead of overwriting it", async () => {
    const filePath = path.join(root, "patterns.json");
    await writeFile(filePath, "{oops", "utf-8");
    const store = new JsonFilePagePatternStore(filePath);

    expect((await store.loadAll())._unsafeUnwrapErr().code).toBe("invalid_json");
    const saved = await store.save({
      signature: "ACME:10-K:2023",
      source: "^Page (\\d+)$",
      registeredAt: "2026-01-05T00:00:00.000Z",
    });
    expect(saved._unsafeUnwrapErr().code).toBe("invalid_json");
    expect(await readFile(filePath, "utf-8")).toBe("{oops");
  });
});
