import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import { boundaryError, type AppBoundaryError } from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { acmeTarget, buildRecord, ManualClock } from "../../__tests__/support/fakes";
import {
  buildReferenceQuery,
  cosineSimilarity,
  prepareText,
  SemanticFilteringService,
  type SemanticFilterOptions,
} from "./semanticFilteringService";

const QUERY = "industrial robots";

const unavailable = (): AppBoundaryError =>
  boundaryError("embedding", "embedding_backend_unavailable", "stub", "backend down", {
    retryable: true,
  });

/**
 * Looks vectors up by exact text. Unknown text embeds to an axis orthogonal to the query.
 */
class StubEmbedding implements EmbeddingPort {
  readonly name = "stub";
  readonly dimension = 4;
  readonly calls: string[] = [];
  readonly batchCalls: string[][] = [];
  failing = new Set<string>();
  hanging = new Set<string>();
  throwing = new Set<string>();
  embedMany?: (texts: string[]) => Promise<Result<number[][], AppBoundaryError>>;

  constructor(private readonly vectors: Record<string, number[]>) {}

  async embed(text: string): Promise<Result<number[], AppBoundaryError>> {
    this.calls.push(text);
    if (this.hanging.has(text)) {
      return new Promise<Result<number[], AppBoundaryError>>(() => {});
    }
    if (this.throwing.has(text)) {
      throw new TypeError("boom");
    }
    if (this.failing.has(text)) {
      return err(unavailable());
    }
    return ok(this.vectors[text] ?? [0, 0, 0, 1]);
  }
}

const options: SemanticFilterOptions = {
  maxTextLength: 2_000,
  batchSize: 2,
  embeddingAttempts: 3,
  embeddingTimeoutMs: 1_000,
};

const vectors: Record<string, number[]> = {
  [QUERY]: [1, 0, 0, 0],
  "title-a body-a": [1, 1, 1, 1],
  "title-b body-b": [0, 1, 0, 0],
  "title-c body-c": [1, 0, 0, 0],
};

describe("SemanticFilteringService", () => {
  it("accepts a score equal to the threshold and rejects one just below", async () => {
    const service = new SemanticFilteringService(new StubEmbedding(vectors), options, new ManualClock());
    const records = [buildRecord("a")];

    const atThreshold = (await service.filter(records, QUERY, 0.5))._unsafeUnwrap();
    const aboveScore = (await service.filter(records, QUERY, 0.5 + 1e-9))._unsafeUnwrap();

    expect(atThreshold.accepted.map((record) => record.score)).toEqual([0.5]);
    expect(aboveScore.accepted).toEqual([]);
    expect(aboveScore.rejected).toEqual([
      { record: records[0], reason: "below_threshold", score: 0.5 },
    ]);
  });

  it("keeps input order and yields identical results on repeat", async () => {
    const service = new SemanticFilteringService(new StubEmbedding(vectors), options, new ManualClock());
    const records = [buildRecord("a"), buildRecord("b"), buildRecord("c")];

    const first = (await service.filter(records, QUERY, 0.4))._unsafeUnwrap();
    const second = (await service.filter(records, QUERY, 0.4))._unsafeUnwrap();

    expect(first.accepted.map((record) => record.id)).toEqual(["a", "c"]);
    expect(first.rejected.map((entry) => entry.record.id)).toEqual(["b"]);
    expect(first.accepted[1]).toEqual({
      ...buildRecord("c"),
      score: 1,
      embedding: [1, 0, 0, 0],
      referenceQuery: QUERY,
    });
    expect(second).toEqual(first);
  });

  it("rejects records with no embeddable text without embedding them", async () => {
    const embedding = new StubEmbedding(vectors);
    const service = new SemanticFilteringService(embedding, options, new ManualClock());
    const blank = buildRecord("blank", { title: "  ", body: "\n" });

    const outcome = (await service.filter([blank, buildRecord("c")], QUERY, 0.4))._unsafeUnwrap();

    expect(outcome.rejected).toEqual([{ record: blank, reason: "empty_text" }]);
    expect(outcome.accepted.map((record) => record.id)).toEqual(["c"]);
    expect(embedding.calls).toEqual([QUERY, "title-c body-c"]);
  });

  it("rejects every record when the reference query cannot be embedded", async () => {
    const embedding = new StubEmbedding(vectors);
    embedding.failing.add(QUERY);
    const clock = new ManualClock();
    const service = new SemanticFilteringService(embedding, options, clock);

    const outcome = (
      await service.filter([buildRecord("a"), buildRecord("c")], QUERY, 0.1)
    )._unsafeUnwrap();

    expect(outcome.accepted).toEqual([]);
    expect(outcome.rejected.map((entry) => [entry.record.id, entry.reason])).toEqual([
      ["a", "embedding_error"],
      ["c", "embedding_error"],
    ]);
    expect(embedding.calls).toEqual([QUERY, QUERY, QUERY]);
    expect(clock.sleeps).toEqual([250, 500]);
  });

  it("records an engine that throws as an embedding error for that record", async () => {
    const embedding = new StubEmbedding(vectors);
    embedding.throwing.add("title-a body-a");
    const service = new SemanticFilteringService(
      embedding,
      { ...options, embeddingAttempts: 2, retryDelayMs: 10 },
      new ManualClock(),
    );

    const outcome = (
      await service.filter([buildRecord("a"), buildRecord("c")], QUERY, 0.4)
    )._unsafeUnwrap();

    expect(outcome.accepted.map((record) => record.id)).toEqual(["c"]);
    expect(outcome.rejected).toEqual([
      { record: buildRecord("a"), reason: "embedding_error", detail: "boom" },
    ]);
    expect(embedding.calls.filter((text) => text === "title-a body-a")).toHaveLength(2);
  });

  it("retries a flaky record embedding and records a persistent failure", async () => {
    const embedding = new StubEmbedding(vectors);
    embedding.failing.add("title-b body-b");
    const service = new SemanticFilteringService(
      embedding,
      { ...options, embeddingAttempts: 2, retryDelayMs: 10 },
      new ManualClock(),
    );

    const outcome = (
      await service.filter([buildRecord("b"), buildRecord("c")], QUERY, 0.4)
    )._unsafeUnwrap();

    expect(outcome.accepted.map((record) => record.id)).toEqual(["c"]);
    expect(outcome.rejected).toEqual([
      { record: buildRecord("b"), reason: "embedding_error", detail: "backend down" },
    ]);
    expect(embedding.calls.filter((text) => text === "title-b body-b")).toHaveLength(2);
  });

  it("embeds in batches and falls back to single calls when a batch fails", async () => {
    const embedding = new StubEmbedding(vectors);
    embedding.embedMany = async (texts) => {
      embedding.batchCalls.push(texts);
      return err(boundaryError("embedding", "malformed_response", "stub", "bad batch"));
    };
    const service = new SemanticFilteringService(embedding, options, new ManualClock());

    const outcome = (
      await service.filter([buildRecord("a"), buildRecord("b"), buildRecord("c")], QUERY, 0.4)
    )._unsafeUnwrap();

    expect(embedding.batchCalls).toEqual([["title-a body-a", "title-b body-b"]]);
    expect(embedding.calls).toEqual([QUERY, "title-a body-a", "title-b body-b", "title-c body-c"]);
    expect(outcome.accepted.map((record) => record.id)).toEqual(["a", "c"]);
  });

  it("uses batch vectors when the batch call succeeds", async () => {
    const embedding = new StubEmbedding(vectors);
    embedding.embedMany = async (texts) => {
      embedding.batchCalls.push(texts);
      return ok(texts.map((text) => vectors[text] ?? [0, 0, 0, 1]));
    };
    const service = new SemanticFilteringService(embedding, options, new ManualClock());

    const outcome = (
      await service.filter([buildRecord("a"), buildRecord("b")], QUERY, 0.4)
    )._unsafeUnwrap();

    expect(embedding.calls).toEqual([QUERY]);
    expect(outcome.accepted.map((record) => record.id)).toEqual(["a"]);
  });

  it("bounds each embedding call by the timeout", async () => {
    const embedding = new StubEmbedding(vectors);
    embedding.hanging.add("title-a body-a");
    const service = new SemanticFilteringService(
      embedding,
      { ...options, embeddingAttempts: 1, embeddingTimeoutMs: 20 },
      new ManualClock(),
    );

    const outcome = (
      await service.filter([buildRecord("a"), buildRecord("c")], QUERY, 0.4)
    )._unsafeUnwrap();

    expect(outcome.rejected).toEqual([
      {
        record: buildRecord("a"),
        reason: "embedding_error",
        detail: "Embedding call exceeded 20ms.",
      },
    ]);
    expect(outcome.accepted.map((record) => record.id)).toEqual(["c"]);
  });

  it("validates the threshold and the reference query", async () => {
    const embedding = new StubEmbedding(vectors);
    const service = new SemanticFilteringService(embedding, options, new ManualClock());

    const badThreshold = await service.filter([buildRecord("a")], QUERY, 1.5);
    const emptyQuery = await service.filter([buildRecord("a")], "   ", 0.5);

    expect(badThreshold._unsafeUnwrapErr().code).toBe("invalid_input");
    expect(emptyQuery._unsafeUnwrapErr().code).toBe("empty_input");
    expect(embedding.calls).toEqual([]);
  });
});

describe("prepareText", () => {
  it("joins title and body, collapses whitespace and truncates", () => {
    const record = buildRecord("x", { title: " Acme  opens ", body: "a\nnew   plant in Lyon" });

    expect(prepareText(record, 2_000)).toBe("Acme opens a new plant in Lyon");
    expect(prepareText(record, 12)).toBe("Acme opens a");
  });
});

describe("cosineSimilarity", () => {
  it("clamps opposite vectors to zero and handles zero vectors", () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([2, 0], [3, 0])).toBe(1);
  });
});

describe("buildReferenceQuery", () => {
  it("combines company identity with client keywords once each", () => {
    expect(
      buildReferenceQuery(acmeTarget, {
        keywords: ["robotics", "Automation", "acme"],
        description: "Mid-size  manufacturers",
      }),
    ).toBe("Acme Robotics Acme industrial automation robotics Automation Mid-size manufacturers");
  });
});
