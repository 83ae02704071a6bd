import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { HttpClient } from "../http/httpClient";

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Embeds through a local Ollama server. Vectors are checked for count, dimension and
 * finiteness before they reach scoring.
 */
export class OllamaEmbedding implements EmbeddingPort {
  readonly name = "ollama";

  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    readonly dimension: number,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async embed(text: string): Promise<Result<number[], AppBoundaryError>> {
    const vectors = await this.embedMany([text]);
    if (vectors.isErr()) {
      return err(vectors.error);
    }

    const [vector] = vectors.value;
    return vector
      ? ok(vector)
      : err(this.malformed("Ollama returned no embedding for a single input."));
  }

  async embedMany(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const emptyIndex = texts.findIndex((text) => !text.trim());
    if (emptyIndex >= 0) {
      return err(
        boundaryError(
          "embedding",
          "empty_input",
          this.name,
          `Cannot embed empty text at index ${emptyIndex}.`,
        ),
      );
    }

    const response = await this.httpClient.requestJson<unknown>({
      url: `${this.baseUrl.replace(/\/+$/, "")}/api/embed`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: { model: this.model, input: texts },
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
    });

    if (response.isErr()) {
      if (response.error.code === "invalid_json") {
        return err(this.malformed(response.error.message));
      }

      return err(
        boundaryError(
          "embedding",
          "embedding_backend_unavailable",
          this.name,
          `Ollama embedding request failed: ${response.error.message}`,
          {
            retryable: true,
            httpStatus: response.error.httpStatus,
            cause: response.error.cause,
          },
        ),
      );
    }

    const parsed = embedResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        this.malformed(
          `Ollama embedding response did not match the expected shape: ${parsed.error.issues[0]?.message ?? "invalid body"}.`,
        ),
      );
    }

    const vectors = parsed.data.embeddings;
    if (vectors.length !== texts.length) {
      return err(
        this.malformed(
          `Ollama embedding response size mismatch. Expected ${texts.length}, got ${vectors.length}.`,
        ),
      );
    }

    for (let index = 0; index < vectors.length; index += 1) {
      const shape = this.assertVectorShape(vectors[index] ?? [], index);
      if (shape.isErr()) {
        return err(shape.error);
      }
    }

    return ok(vectors);
  }

  private assertVectorShape(
    vector: number[],
    index: number,
  ): Result<number[], AppBoundaryError> {
    if (vector.length !== this.dimension) {
      return err(
        this.malformed(
          `Embedding dimension mismatch for index ${index}. Expected ${this.dimension}, got ${vector.length}.`,
        ),
      );
    }

    if (vector.some((value) => !Number.isFinite(value))) {
      return err(
        this.malformed(`Embedding vector contains non-finite values at index ${index}.`),
      );
    }

    return ok(vector);
  }

  private malformed(message: string): AppBoundaryError {
    return boundaryError("embedding", "malformed_response", this.name, message);
  }
}
