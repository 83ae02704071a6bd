import type { PipelineRun } from "../core/entities/pipelineRun";

const persistenceLine = (run: PipelineRun): string => {
  const outcome = run.persistence;
  switch (outcome.status) {
    case "saved":
      return `saved (${outcome.recordCount} records)`;
    case "failed":
      return `failed: ${outcome.reason}`;
    default:
      return outcome.status;
  }
};

/**
 * Renders a finished run as a compact terminal report.
 */
export const formatRunReport = (run: PipelineRun, maxRecords = 10): string => {
  const lines: string[] = [];

  lines.push(`Run ${run.id} for ${run.company.name}: ${run.state}`);
  lines.push(`Started: ${run.startedAt.toISOString()}`);
  if (run.finishedAt) {
    lines.push(`Finished: ${run.finishedAt.toISOString()}`);
  }
  lines.push(`Plugins: ${run.pluginNames.join(", ") || "none"}`);
  lines.push(
    `Counts: fetched=${run.counts.fetched}, accepted=${run.counts.accepted}, rejected=${run.counts.rejected}, failed=${run.counts.failed}`,
  );
  lines.push(`Persistence: ${persistenceLine(run)}`);

  if (run.failure) {
    lines.push(`Failure: [${run.failure.code}] ${run.failure.message}`);
  }

  lines.push("");
  lines.push("Plugin errors:");
  if (run.pluginErrors.length === 0) {
    lines.push("- none");
  } else {
    run.pluginErrors.forEach((failure) => {
      lines.push(
        `- ${failure.plugin}: code=${failure.code}, attempts=${failure.attempts}, retryable=${failure.retryable}${typeof failure.httpStatus === "number" ? `, httpStatus=${failure.httpStatus}` : ""}, reason=${failure.message}`,
      );
    });
  }

  lines.push("");
  lines.push("Accepted records:");
  if (run.acceptedRecords.length === 0) {
    lines.push("- none");
  } else {
    run.acceptedRecords.slice(0, maxRecords).forEach((record, index) => {
      const title = record.title.trim() ? record.title : "(untitled)";
      lines.push(`${index + 1}. [${record.source}] ${title} (score ${record.score.toFixed(3)})`);
      lines.push(`   ${record.url}`);
    });
    const hidden = run.acceptedRecords.length - maxRecords;
    if (hidden > 0) {
      lines.push(`... ${hidden} more`);
    }
  }

  return lines.join("\n");
};
