import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  PagePatternStorePort,
  StoredPagePattern,
} from "../../core/ports/outboundPorts";

const storeFileSchema = z.object({
  version: z.literal(1),
  patterns: z.array(
    z.object({
      signature: z.string().min(1),
      source: z.string().min(1),
      registeredAt: z.string(),
    }),
  ),
});

type StoreFile = z.infer<typeof storeFileSchema>;

const isMissing = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Page patterns kept in one JSON file. Writes go through a temporary file and
 * a rename so a crash never leaves a half-written store.
 */
export class JsonFilePagePatternStore implements PagePatternStorePort {
  private writes: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async loadAll(): Promise<Result<StoredPagePattern[], AppBoundaryError>> {
    return (await this.readStore()).map((store) => store.patterns);
  }

  async save(
    entry: StoredPagePattern,
  ): Promise<Result<void, AppBoundaryError>> {
    const write = this.writes.then(() => this.append(entry));
    this.writes = write;
    return write;
  }

  private async append(
    entry: StoredPagePattern,
  ): Promise<Result<void, AppBoundaryError>> {
    const current = await this.readStore();
    if (current.isErr()) {
      return err(current.error);
    }

    const stored = current.value.patterns.find(
      (pattern) => pattern.signature === entry.signature,
    );
    if (stored) {
      return stored.source === entry.source
        ? ok(undefined)
        : err(
            this.failure(
              "conflict",
              `Signature ${entry.signature} is already stored with a different page pattern.`,
            ),
          );
    }

    const next: StoreFile = {
      version: 1,
      patterns: [...current.value.patterns, entry],
    };

    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(next, null, 2)}\n`, "utf-8");
      await rename(tempPath, this.filePath);
      return ok(undefined);
    } catch (error) {
      return err(
        this.failure(
          "io_error",
          `Failed to write page patterns to ${this.filePath}.`,
          error,
        ),
      );
    }
  }

  private async readStore(): Promise<Result<StoreFile, AppBoundaryError>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        return ok({ version: 1, patterns: [] });
      }

      return err(
        this.failure(
          "io_error",
          `Failed to read page patterns from ${this.filePath}.`,
          error,
        ),
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      return err(
        this.failure(
          "invalid_json",
          `Page pattern store ${this.filePath} is not valid JSON.`,
          error,
        ),
      );
    }

    const parsed = storeFileSchema.safeParse(payload);
    if (!parsed.success) {
      return err(
        this.failure(
          "malformed_response",
          `Page pattern store ${this.filePath} has an unexpected shape.`,
          parsed.error,
        ),
      );
    }

    return ok(parsed.data);
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    cause?: unknown,
  ): AppBoundaryError {
    return {
      source: "pattern_store",
      code,
      provider: "json-file",
      message,
      retryable: false,
      ...(cause === undefined ? {} : { cause }),
    };
  }
}
