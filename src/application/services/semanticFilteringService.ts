import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { ClientProfile, CompanyTarget } from "../../core/entities/company";
import type {
  FilterOutcome,
  RawRecord,
  RejectedRecord,
  ScoredRecord,
} from "../../core/entities/record";
import type { ClockPort, EmbeddingPort } from "../../core/ports/outboundPorts";
import { SystemClock } from "../../infra/system/systemPorts";
import { withTimeout } from "../../shared/async/withTimeout";
import { logger } from "../../shared/logger/logger";

export type SemanticFilterOptions = {
  maxTextLength: number;
  batchSize: number;
  embeddingAttempts: number;
  embeddingTimeoutMs: number;
  retryDelayMs?: number;
};

type Pending = { index: number; record: RawRecord; text: string };

type Decision =
  | { kind: "accepted"; record: ScoredRecord }
  | { kind: "rejected"; record: RejectedRecord };

/**
 * Text that gets embedded for a record: title and body, whitespace-collapsed and cut
 * to `maxLength` characters.
 */
export const prepareText = (record: RawRecord, maxLength: number): string =>
  `${record.title} ${record.body}`.replace(/\s+/g, " ").trim().slice(0, maxLength).trim();

/**
 * Cosine similarity clamped to [0, 1]. Mismatched or zero vectors score 0.
 */
export const cosineSimilarity = (
  left: readonly number[],
  right: readonly number[],
): number => {
  if (left.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  const similarity = dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
  return Math.min(1, Math.max(0, similarity));
};

/**
 * Reference query for a run: who the company is plus what the client cares about.
 * Repeated terms (case-insensitive) appear once.
 */
export const buildReferenceQuery = (
  target: CompanyTarget,
  clientProfile: ClientProfile,
): string => {
  const parts = [
    target.name,
    ...target.aliases,
    target.industry,
    ...clientProfile.keywords,
    clientProfile.description,
  ]
    .map((part) => part?.replace(/\s+/g, " ").trim() ?? "")
    .filter(Boolean);

  const seen = new Set<string>();
  return parts
    .filter((part) => {
      const key = part.toLowerCase();
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    })
    .join(" ");
};

/**
 * Keeps records whose embedding is close enough to the reference query. Output order
 * follows input order; the threshold is inclusive.
 */
export class SemanticFilteringService {
  constructor(
    private readonly embedding: EmbeddingPort,
    private readonly options: SemanticFilterOptions,
    private readonly clock: ClockPort = new SystemClock(),
  ) {}

  async filter(
    records: readonly RawRecord[],
    referenceQuery: string,
    threshold: number,
  ): Promise<Result<FilterOutcome, AppBoundaryError>> {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      return err(
        boundaryError(
          "filter",
          "invalid_input",
          this.embedding.name,
          `Similarity threshold must be within [0, 1], got ${threshold}.`,
        ),
      );
    }

    const query = referenceQuery.replace(/\s+/g, " ").trim();
    if (!query) {
      return err(
        boundaryError("filter", "empty_input", this.embedding.name, "Reference query must not be empty."),
      );
    }

    if (records.length === 0) {
      return ok({ accepted: [], rejected: [] });
    }

    const queryVector = await this.withRetries(() => this.embedding.embed(query));
    if (queryVector.isErr()) {
      logger.error(
        { embedding: this.embedding.name, code: queryVector.error.code, reason: queryVector.error.message },
        "Reference query embedding failed; rejecting every record",
      );
      return ok({
        accepted: [],
        rejected: records.map((record) => ({
          record,
          reason: "embedding_error",
          detail: queryVector.error.message,
        })),
      });
    }

    const decisions = new Array<Decision | undefined>(records.length);
    const pending: Pending[] = [];

    records.forEach((record, index) => {
      const text = prepareText(record, this.options.maxTextLength);
      if (text) {
        pending.push({ index, record, text });
        return;
      }
      decisions[index] = { kind: "rejected", record: { record, reason: "empty_text" } };
    });

    for (let start = 0; start < pending.length; start += this.options.batchSize) {
      const batch = pending.slice(start, start + this.options.batchSize);
      const vectors = await this.embedBatch(batch);

      batch.forEach((entry, offset) => {
        const vector = vectors[offset];
        if (vector === undefined) {
          decisions[entry.index] = this.embeddingFailure(entry.record, undefined);
        } else if (vector.isErr()) {
          decisions[entry.index] = this.embeddingFailure(entry.record, vector.error);
        } else {
          decisions[entry.index] = this.score(
            entry.record,
            vector.value,
            queryVector.value,
            query,
            threshold,
          );
        }
      });
    }

    const accepted: ScoredRecord[] = [];
    const rejected: RejectedRecord[] = [];
    decisions.forEach((decision) => {
      if (decision?.kind === "accepted") {
        accepted.push(decision.record);
      } else if (decision) {
        rejected.push(decision.record);
      }
    });

    logger.info(
      {
        embedding: this.embedding.name,
        threshold,
        total: records.length,
        accepted: accepted.length,
        rejected: rejected.length,
      },
      "Semantic filtering completed",
    );

    return ok({ accepted, rejected });
  }

  /**
   * One batch call when the engine supports it; per-record calls otherwise or when the
   * batch call fails, so one bad record cannot sink its neighbours.
   */
  private async embedBatch(
    batch: Pending[],
  ): Promise<Array<Result<number[], AppBoundaryError>>> {
    const embedMany = this.embedding.embedMany?.bind(this.embedding);

    if (embedMany && batch.length > 1) {
      const many = await this.withRetries(() => embedMany(batch.map((entry) => entry.text)));
      if (many.isOk() && many.value.length === batch.length) {
        return many.value.map((vector) => ok(vector));
      }

      logger.warn(
        {
          embedding: this.embedding.name,
          batchSize: batch.length,
          reason: many.isErr() ? many.error.message : "vector count mismatch",
        },
        "Batch embedding failed; falling back to per-record calls",
      );
    }

    return Promise.all(
      batch.map((entry) => this.withRetries(() => this.embedding.embed(entry.text))),
    );
  }

  private score(
    record: RawRecord,
    vector: number[],
    queryVector: number[],
    referenceQuery: string,
    threshold: number,
  ): Decision {
    const score = cosineSimilarity(vector, queryVector);
    if (score >= threshold) {
      return {
        kind: "accepted",
        record: { ...record, score, embedding: vector, referenceQuery },
      };
    }

    logger.debug({ recordId: record.id, score, threshold }, "Record below threshold");
    return { kind: "rejected", record: { record, reason: "below_threshold", score } };
  }

  private embeddingFailure(
    record: RawRecord,
    error: AppBoundaryError | undefined,
  ): Decision {
    if (error?.code === "empty_input") {
      return { kind: "rejected", record: { record, reason: "empty_text" } };
    }

    logger.warn(
      { recordId: record.id, code: error?.code, reason: error?.message },
      "Record embedding failed",
    );
    return {
      kind: "rejected",
      record: {
        record,
        reason: "embedding_error",
        detail: error?.message ?? "No embedding returned.",
      },
    };
  }

  /**
   * Turns an engine that throws into a retryable backend error.
   */
  private async guard<T>(
    call: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>> {
    try {
      return await call();
    } catch (error) {
      logger.warn(
        { embedding: this.embedding.name, error },
        "Embedding engine threw instead of returning an error",
      );
      return err(
        boundaryError(
          "embedding",
          "embedding_backend_unavailable",
          this.embedding.name,
          error instanceof Error ? error.message : String(error),
          { retryable: true, cause: error },
        ),
      );
    }
  }

  /**
   * Bounds each embedding call by the configured timeout and retries retryable failures.
   */
  private async withRetries<T>(
    call: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>> {
    const attempts = Math.max(1, this.options.embeddingAttempts);
    const retryDelayMs = this.options.retryDelayMs ?? 250;
    let lastError: AppBoundaryError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const result = await withTimeout<Result<T, AppBoundaryError>>(
        this.guard(call),
        this.options.embeddingTimeoutMs,
        () =>
          err(
            boundaryError(
              "embedding",
              "timeout",
              this.embedding.name,
              `Embedding call exceeded ${this.options.embeddingTimeoutMs}ms.`,
              { retryable: true },
            ),
          ),
      );

      if (result.isOk() || !result.error.retryable) {
        return result;
      }

      lastError = result.error;
      if (attempt < attempts) {
        await this.clock.sleep(retryDelayMs * attempt);
      }
    }

    return err(
      lastError ??
        boundaryError("embedding", "embedding_backend_unavailable", this.embedding.name, "Embedding failed."),
    );
  }
}
