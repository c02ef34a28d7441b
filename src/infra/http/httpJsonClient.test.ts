import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { HttpJsonClient } from "./httpJsonClient";

const okSchema = z.object({ ok: z.boolean() });

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  vi.stubGlobal("fetch", handler);
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpJsonClient", () => {
  it("retries retryable failures up to configured attempts", async () => {
    let attempts = 0;

    setFetch(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw new Error("socket reset");
      }

      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "http://classifier.test/retry",
      method: "GET",
      schema: okSchema,
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 1,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({ ok: true });
    expect(attempts).toBe(3);
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          if (signal.aborted) {
            reject(new DOMException("Aborted", "AbortError"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "http://classifier.test/timeout",
      method: "GET",
      schema: okSchema,
      timeoutMs: 5,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "http://classifier.test/status",
      method: "GET",
      schema: okSchema,
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.code).toBe("non_success_status");
    expect(result.error.httpStatus).toBe(503);
    expect(result.error.retryable).toBe(true);
  });

  it("maps invalid JSON payloads as non-retryable", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "http://classifier.test/json",
      method: "GET",
      schema: okSchema,
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected invalid json error");
    }

    expect(result.error.code).toBe("invalid_json");
    expect(result.error.retryable).toBe(false);
  });

  it("rejects bodies that do not match the schema", async () => {
    setFetch(
      async () => new Response(JSON.stringify({ ok: "yes" }), { status: 200 }),
    );

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "http://classifier.test/shape",
      method: "GET",
      schema: okSchema,
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected shape error");
    }

    expect(result.error.code).toBe("unexpected_shape");
    expect(result.error.retryable).toBe(false);
  });
});
