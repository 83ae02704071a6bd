export type RawRecord = {
  readonly id: string;
  readonly source: string;
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly publishedAt?: Date;
  readonly metadata: Readonly<Record<string, string>>;
};

export type ScoredRecord = RawRecord & {
  readonly score: number;
  readonly embedding: readonly number[];
  readonly referenceQuery: string;
};

export type RejectionReason = "below_threshold" | "empty_text" | "embedding_error";

export type RejectedRecord = {
  readonly record: RawRecord;
  readonly reason: RejectionReason;
  readonly score?: number;
  readonly detail?: string;
};

/**
 * Result of one filtering pass. Both lists keep the input order of their records.
 */
export type FilterOutcome = {
  readonly accepted: ScoredRecord[];
  readonly rejected: RejectedRecord[];
};
