import { describe, expect, it } from "vitest";
import { HashingEmbedding, tokenize } from "./hashingEmbedding";

const dot = (left: number[], right: number[]): number =>
  left.reduce((sum, value, index) => sum + value * (right[index] ?? 0), 0);

describe("HashingEmbedding", () => {
  it("is deterministic and case-insensitive", async () => {
    const embedding = new HashingEmbedding(64);

    const first = (await embedding.embed("Acme Robotics hires engineers"))._unsafeUnwrap();
    const second = (await embedding.embed("acme ROBOTICS, hires engineers!"))._unsafeUnwrap();

    expect(first).toEqual(second);
    expect(first).toHaveLength(64);
  });

  it("returns unit-length vectors", async () => {
    const vector = (await new HashingEmbedding(32).embed("one two two three"))._unsafeUnwrap();

    expect(dot(vector, vector)).toBeCloseTo(1, 10);
  });

  it("scores shared vocabulary above unrelated text", async () => {
    const embedding = new HashingEmbedding(256);
    const query = (await embedding.embed("industrial robots automation"))._unsafeUnwrap();
    const related = (await embedding.embed("new industrial robots"))._unsafeUnwrap();
    const unrelated = (await embedding.embed("bakery opens downtown"))._unsafeUnwrap();

    expect(dot(query, related)).toBeGreaterThan(dot(query, unrelated));
  });

  it("rejects text without tokens", async () => {
    const error = (await new HashingEmbedding(8).embed("  ... "))._unsafeUnwrapErr();

    expect(error.code).toBe("empty_input");
    expect(error.retryable).toBe(false);
  });

  it("tokenizes accented words as single tokens", () => {
    expect(tokenize("Société Générale, 2026")).toEqual(["société", "générale", "2026"]);
  });
});
