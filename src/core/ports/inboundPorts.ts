import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { ClientProfile, CompanyTarget } from "../entities/company";
import type { PipelineRun } from "../entities/pipelineRun";
import type { RawRecord } from "../entities/record";

export type FetchRequest = {
  target: CompanyTarget;
  since?: Date;
  // Aborted when the attempt times out; plugins pass it to every outbound call.
  signal?: AbortSignal;
};

/**
 * One external source. Implementations perform network IO but never persist anything.
 */
export interface SourcePluginPort {
  readonly name: string;
  fetch(request: FetchRequest): Promise<Result<RawRecord[], AppBoundaryError>>;
}

export type PluginFactory = () => SourcePluginPort;

export type PipelineRunOptions = {
  sources: string[];
  clientProfile: ClientProfile;
  threshold: number;
  since?: Date;
  runId?: string;
  signal?: AbortSignal;
};

export interface PipelineRunnerPort {
  run(target: CompanyTarget, options: PipelineRunOptions): Promise<PipelineRun>;
  snapshot(runId: string): PipelineRun | null;
  listRuns(): PipelineRun[];
}
