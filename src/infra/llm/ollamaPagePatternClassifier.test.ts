import { afterEach, describe, expect, it, vi } from "vitest";
import { OllamaPagePatternClassifier } from "./ollamaPagePatternClassifier";

const chatReply = (content: string): Response =>
  new Response(JSON.stringify({ message: { role: "assistant", content } }), {
    status: 200,
  });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaPagePatternClassifier", () => {
  it("posts the sample to the chat endpoint and returns the raw reply", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      chatReply("  ===^\\s*(\\d+)\\s*$===  "),
    );
    vi.stubGlobal("fetch", fetchMock);

    const classifier = new OllamaPagePatternClassifier(
      "http://ollama.test",
      "test-model",
      500,
    );
    const reply = await classifier.proposePagePattern({
      signature: "ACME:10-K:2023",
      sample: "Body\n12\n",
    });

    expect(reply._unsafeUnwrap()).toBe("===^\\s*(\\d+)\\s*$===");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://ollama.test/api/chat");
    expect(init?.method).toBe("POST");
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: "test-model", stream: false });
  });

  it("parses table of contents entries and coerces numeric pages", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      chatReply(
        JSON.stringify({
          entries: [
            { item: "Item 1A", description: "Risk Factors", page: 12 },
            { item: "Item 2", page: "20" },
          ],
        }),
      ),
    );
    vi.stubGlobal("fetch", fetchMock);

    const classifier = new OllamaPagePatternClassifier("http://ollama.test", "test-model", 500);
    const toc = await classifier.extractTableOfContents("Table of Contents ...");

    expect(toc._unsafeUnwrap()).toEqual([
      { item: "Item 1A", description: "Risk Factors", page: "12" },
      { item: "Item 2", description: "", page: "20" },
    ]);
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({ format: "json" });
  });

  it("reports replies that are not JSON", async () => {
    vi.stubGlobal("fetch", async () => chatReply("Item 1A is on page 12"));

    const classifier = new OllamaPagePatternClassifier("http://ollama.test", "test-model", 500);
    const failure = (
      await classifier.extractTableOfContents("Table of Contents ...")
    )._unsafeUnwrapErr();

    expect(failure).toMatchObject({
      source: "classifier",
      code: "invalid_json",
      provider: "ollama",
      retryable: false,
    });
  });

  it("maps rate limiting from the chat endpoint", async () => {
    vi.stubGlobal("fetch", async () => new Response("slow down", { status: 429 }));

    const classifier = new OllamaPagePatternClassifier("http://ollama.test", "test-model", 500);
    const failure = (
      await classifier.proposePagePattern({ signature: "ACME:10-K:2023", sample: "x" })
    )._unsafeUnwrapErr();

    expect(failure.code).toBe("rate_limited");
    expect(failure.httpStatus).toBe(429);
  });

  it("rejects an empty message", async () => {
    vi.stubGlobal("fetch", async () => chatReply("   "));

    const classifier = new OllamaPagePatternClassifier("http://ollama.test", "test-model", 500);
    const failure = (
      await classifier.proposePagePattern({ signature: "ACME:10-K:2023", sample: "x" })
    )._unsafeUnwrapErr();

    expect(failure.code).toBe("malformed_response");
  });
});
