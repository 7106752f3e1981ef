import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../http/httpJsonClient";
import { ollamaErrorCode } from "./ollamaErrors";

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export type OllamaEmbeddingOptions = {
  baseUrl: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
  retries?: number;
  retryDelayMs?: number;
};

const embeddingError = (
  code: AppBoundaryError["code"],
  message: string,
): AppBoundaryError => ({
  source: "embedding",
  code,
  provider: "ollama",
  message,
  retryable: false,
});

/**
 * Checks the batch against the pgvector column width; a wrong-sized model would otherwise fail at insert time.
 */
export const checkEmbeddingBatch = (
  vectors: number[][],
  expectedCount: number,
  dimensions: number,
): Result<number[][], AppBoundaryError> => {
  if (vectors.length !== expectedCount) {
    return err(
      embeddingError(
        "invalid_response",
        `Expected ${expectedCount} embeddings, got ${vectors.length}.`,
      ),
    );
  }

  for (const [index, vector] of vectors.entries()) {
    if (vector.length !== dimensions) {
      return err(
        embeddingError(
          "dimension_mismatch",
          `Embedding ${index} has ${vector.length} dimensions; the rule index stores ${dimensions}.`,
        ),
      );
    }
    if (!vector.every(Number.isFinite)) {
      return err(
        embeddingError("validation_error", `Embedding ${index} contains non-finite values.`),
      );
    }
  }

  return ok(vectors);
};

/**
 * Embeds rule section texts in one `/api/embed` batch per call.
 */
export class OllamaEmbedding implements EmbeddingPort {
  constructor(
    private readonly options: OllamaEmbeddingOptions,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const response = await this.httpClient.requestJson({
      url: `${this.options.baseUrl}/api/embed`,
      method: "POST",
      body: { model: this.options.model, input: texts, truncate: true },
      timeoutMs: this.options.timeoutMs,
      retries: this.options.retries ?? 2,
      retryDelayMs: this.options.retryDelayMs ?? 300,
    });

    if (response.isErr()) {
      return err({
        source: "embedding",
        code: ollamaErrorCode(response.error),
        provider: "ollama",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const parsed = embedResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        embeddingError("invalid_response", "Ollama embedding payload had no embeddings matrix."),
      );
    }

    return checkEmbeddingBatch(parsed.data.embeddings, texts.length, this.options.dimensions);
  }
}
