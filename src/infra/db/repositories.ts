import { sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { err, ok, Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { CompanyTarget } from "../../core/entities/company";
import type { ScoredRecord } from "../../core/entities/record";
import type { ScoredRecordRepositoryPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  SCORED_RECORD_EMBEDDING_DIMENSION,
  scoredRecordsTable,
  type ScoredRecordRow,
} from "./schema";

/**
 * Maps a scored record to its row. Fails when the vector cannot fit the pgvector column.
 */
export const toScoredRecordRow = (
  company: CompanyTarget,
  record: ScoredRecord,
  now: Date,
  dimension = SCORED_RECORD_EMBEDDING_DIMENSION,
): Result<ScoredRecordRow, AppBoundaryError> => {
  if (record.embedding.length !== dimension) {
    return err(
      boundaryError(
        "persistence",
        "persistence_failed",
        "postgres",
        `Record ${record.id} has a ${record.embedding.length}-dimension embedding; the column stores ${dimension}.`,
      ),
    );
  }

  return ok({
    companyName: company.name.trim(),
    recordId: record.id,
    source: record.source,
    title: record.title,
    body: record.body,
    url: record.url,
    publishedAt: record.publishedAt ?? null,
    metadata: { ...record.metadata },
    score: record.score,
    referenceQuery: record.referenceQuery,
    embedding: [...record.embedding],
    createdAt: now,
    updatedAt: now,
  });
};

/**
 * Maps a batch to rows with one row per record id. A single upsert statement cannot
 * touch the same key twice, so repeats after the first are dropped.
 */
export const toScoredRecordRows = (
  company: CompanyTarget,
  records: readonly ScoredRecord[],
  now: Date,
  dimension = SCORED_RECORD_EMBEDDING_DIMENSION,
): Result<ScoredRecordRow[], AppBoundaryError> => {
  const seen = new Set<string>();
  const unique = records.filter((record) => {
    if (seen.has(record.id)) {
      return false;
    }
    seen.add(record.id);
    return true;
  });

  return Result.combine(
    unique.map((record) => toScoredRecordRow(company, record, now, dimension)),
  );
};

/**
 * Upserts accepted records per company so a re-run refreshes scores instead of duplicating rows.
 */
export class PostgresScoredRecordRepository implements ScoredRecordRepositoryPort {
  constructor(
    private readonly db: PostgresJsDatabase<Record<string, never>>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async save(
    company: CompanyTarget,
    records: readonly ScoredRecord[],
  ): Promise<Result<void, AppBoundaryError>> {
    if (records.length === 0) {
      return ok(undefined);
    }

    const now = this.now();
    const rows = toScoredRecordRows(company, records, now);
    if (rows.isErr()) {
      return err(rows.error);
    }

    try {
      await this.db
        .insert(scoredRecordsTable)
        .values(rows.value)
        .onConflictDoUpdate({
          target: [scoredRecordsTable.companyName, scoredRecordsTable.recordId],
          set: {
            title: sql`excluded.title`,
            body: sql`excluded.body`,
            metadata: sql`excluded.metadata`,
            score: sql`excluded.score`,
            referenceQuery: sql`excluded.reference_query`,
            embedding: sql`excluded.embedding`,
            updatedAt: sql`excluded.updated_at`,
          },
        });
    } catch (error) {
      logger.error(
        { company: company.name, recordCount: records.length, error },
        "Scored record upsert failed",
      );
      return err(
        boundaryError(
          "persistence",
          "persistence_failed",
          "postgres",
          error instanceof Error ? error.message : String(error),
          { retryable: true, cause: error },
        ),
      );
    }

    logger.info(
      { company: company.name, recordCount: rows.value.length },
      "Scored records saved",
    );
    return ok(undefined);
  }
}
