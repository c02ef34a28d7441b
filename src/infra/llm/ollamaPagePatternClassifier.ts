import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { TocEntry } from "../../core/entities/page";
import type {
  PagePatternClassifierPort,
  PagePatternPrompt,
} from "../../core/ports/inboundPorts";
import { HttpJsonClient, type HttpClientError } from "../http/httpJsonClient";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).partial().optional(),
});

const tocEntrySchema = z.object({
  item: z.coerce.string(),
  description: z.coerce.string().default(""),
  page: z.coerce.string(),
});

const tocReplySchema = z.union([
  z.array(tocEntrySchema),
  z.object({ entries: z.array(tocEntrySchema) }).transform((reply) => reply.entries),
]);

const pagePatternInstructions = [
  "You are given a chunk of a regulatory filing converted to text.",
  "Pages end with a footer that contains the printed page number.",
  "Reply with one regular expression that matches every page footer line",
  "and captures the page number in its first capture group.",
  "Wrap the expression in === delimiters, for example ===^\\s*(\\d+)\\s*$===.",
].join(" ");

const tocInstructions = [
  "Extract the table of contents from the start of this regulatory filing.",
  'Reply with JSON: {"entries": [{"item": "Item 1A", "description": "Risk Factors", "page": "12"}]}.',
  "Use the printed page numbers and keep the document order.",
].join(" ");

/**
 * Page-layout helpers backed by an Ollama chat model.
 */
export class OllamaPagePatternClassifier implements PagePatternClassifierPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async proposePagePattern(
    prompt: PagePatternPrompt,
  ): Promise<Result<string, AppBoundaryError>> {
    return this.chat(
      `${pagePatternInstructions}\n\nLayout: ${prompt.signature}\n\n${prompt.sample}`,
    );
  }

  async extractTableOfContents(
    tocText: string,
  ): Promise<Result<TocEntry[], AppBoundaryError>> {
    const reply = await this.chat(`${tocInstructions}\n\n${tocText}`, "json");
    if (reply.isErr()) {
      return err(reply.error);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(reply.value);
    } catch (error) {
      return err(
        this.failure("invalid_json", "Table of contents reply was not JSON.", {
          cause: error,
        }),
      );
    }

    const parsed = tocReplySchema.safeParse(payload);
    if (!parsed.success) {
      return err(
        this.failure(
          "malformed_response",
          "Table of contents reply did not list entries with item and page.",
          { cause: parsed.error },
        ),
      );
    }

    return ok(parsed.data);
  }

  private async chat(
    prompt: string,
    format?: "json",
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        ...(format ? { format } : {}),
        messages: [{ role: "user", content: prompt }],
      },
      schema: chatResponseSchema,
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
    });

    if (response.isErr()) {
      return err(
        this.failure(
          this.mapHttpCode(response.error.httpStatus, response.error.code),
          response.error.message,
          {
            retryable: response.error.retryable,
            httpStatus: response.error.httpStatus,
            cause: response.error.cause,
          },
        ),
      );
    }

    const content = response.value.message?.content?.trim();
    if (!content) {
      return err(
        this.failure(
          "malformed_response",
          "Ollama chat payload did not contain message.content.",
        ),
      );
    }

    return ok(content);
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    extra: Partial<Pick<AppBoundaryError, "retryable" | "httpStatus" | "cause">> = {},
  ): AppBoundaryError {
    return {
      source: "classifier",
      code,
      provider: "ollama",
      message,
      retryable: extra.retryable ?? false,
      ...(extra.httpStatus === undefined ? {} : { httpStatus: extra.httpStatus }),
      ...(extra.cause === undefined ? {} : { cause: extra.cause }),
    };
  }

  private mapHttpCode(
    httpStatus: number | undefined,
    errorCode: HttpClientError["code"],
  ): AppBoundaryError["code"] {
    if (httpStatus === 429) {
      return "rate_limited";
    }

    if (httpStatus === 401 || httpStatus === 403) {
      return "auth_invalid";
    }

    if (errorCode === "timeout") {
      return "timeout";
    }

    if (errorCode === "invalid_json") {
      return "invalid_json";
    }

    if (errorCode === "unexpected_shape") {
      return "malformed_response";
    }

    if (errorCode === "transport_error") {
      return "transport_error";
    }

    return "provider_error";
  }
}
