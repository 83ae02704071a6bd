/**
 * Hyphen-only names because BullMQ uses colon as an internal Redis key separator.
 */
export const queueNames = {
  pipelineRun: "signal-pipeline-run",
} as const;

/**
 * BullMQ rejects custom job ids containing a colon, and record ids are built with colons.
 */
export const toJobId = (idempotencyKey: string): string =>
  idempotencyKey.replace(/:/g, "-");
