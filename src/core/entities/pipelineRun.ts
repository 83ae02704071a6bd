import type { AppBoundaryError, AppBoundaryErrorCode } from "./appError";
import type { CompanyTarget } from "./company";
import type { ScoredRecord } from "./record";

export type PipelineRunState =
  | "pending"
  | "fetching_all"
  | "filtering"
  | "completed"
  | "partially_failed"
  | "failed";

export const terminalRunStates: ReadonlySet<PipelineRunState> = new Set([
  "completed",
  "partially_failed",
  "failed",
]);

export type PipelineRunCounts = {
  fetched: number;
  accepted: number;
  rejected: number;
  failed: number;
};

export type PluginFailure = {
  plugin: string;
  code: AppBoundaryErrorCode;
  message: string;
  retryable: boolean;
  attempts: number;
  httpStatus?: number;
};

export type PersistenceOutcome =
  | { status: "pending" }
  | { status: "skipped" }
  | { status: "saved"; recordCount: number }
  | { status: "failed"; reason: string };

export type PipelineRun = {
  id: string;
  company: CompanyTarget;
  state: PipelineRunState;
  startedAt: Date;
  finishedAt?: Date;
  pluginNames: string[];
  succeededPlugins: string[];
  counts: PipelineRunCounts;
  pluginErrors: PluginFailure[];
  persistence: PersistenceOutcome;
  cancelled: boolean;
  failure?: AppBoundaryError;
  acceptedRecords: ScoredRecord[];
};
