import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyTarget } from "../entities/company";
import type { ScoredRecord } from "../entities/record";

export type PipelineJobPayload = {
  runId: string;
  company: {
    name: string;
    industry?: string;
    domain?: string;
    city?: string;
    aliases: string[];
  };
  sources?: string[];
  since?: string;
  requestedAt: string;
  idempotencyKey: string;
};

export interface QueuePort {
  enqueue(payload: PipelineJobPayload): Promise<void>;
}

/**
 * Narrow persistence contract; called once per finalized run with the accepted set.
 */
export interface ScoredRecordRepositoryPort {
  save(
    company: CompanyTarget,
    records: readonly ScoredRecord[],
  ): Promise<Result<void, AppBoundaryError>>;
}

/**
 * Deterministic text embedding. `embedMany` is optional; callers fall back to `embed`.
 */
export interface EmbeddingPort {
  readonly name: string;
  readonly dimension: number;
  embed(text: string): Promise<Result<number[], AppBoundaryError>>;
  embedMany?(texts: string[]): Promise<Result<number[][], AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export interface IdGeneratorPort {
  next(): string;
}

export type ConcurrencyLease = {
  readonly jobName: string;
  release(): void;
};

/**
 * Process-wide cap on in-flight external calls.
 */
export interface ConcurrencyLimiterPort {
  readonly ceiling: number;
  acquire(jobName: string): Promise<Result<ConcurrencyLease, AppBoundaryError>>;
}

/**
 * Per-source request rate admission. Tokens are consumed, never released.
 */
export interface SourceThrottlePort {
  acquire(source: string): Promise<Result<void, AppBoundaryError>>;
}
