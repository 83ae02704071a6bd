import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const fnv1a = (token: string): number => {
  let hash = FNV_OFFSET;
  for (let index = 0; index < token.length; index += 1) {
    hash ^= token.charCodeAt(index);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
};

export const tokenize = (text: string): string[] =>
  text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

/**
 * Offline embedding: token counts feature-hashed into a fixed number of buckets and
 * L2-normalised. Texts sharing vocabulary score high; nothing else is modelled.
 */
export class HashingEmbedding implements EmbeddingPort {
  readonly name = "hashing";

  constructor(readonly dimension = 768) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Embedding dimension must be a positive integer, got ${dimension}.`);
    }
  }

  async embed(text: string): Promise<Result<number[], AppBoundaryError>> {
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      return err(
        boundaryError("embedding", "empty_input", this.name, "Cannot embed empty text."),
      );
    }

    const vector = new Array<number>(this.dimension).fill(0);
    tokens.forEach((token) => {
      const bucket = fnv1a(token) % this.dimension;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    });

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return ok(vector.map((value) => value / norm));
  }

  async embedMany(texts: string[]): Promise<Result<number[][], AppBoundaryError>> {
    const vectors: number[][] = [];
    for (const text of texts) {
      const vector = await this.embed(text);
      if (vector.isErr()) {
        return err(vector.error);
      }
      vectors.push(vector.value);
    }
    return ok(vectors);
  }
}
