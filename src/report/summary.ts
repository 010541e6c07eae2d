import { STATUS_ICON, formatDuration } from "./events.js";
import type { JobResult, PipelineResult, StageResult } from "../types/result.js";

export const OUTPUT_TAIL_LINES = 20;

export function tailLines(output: string, n: number): string[] {
  const trimmed = output.trimEnd();
  if (trimmed === "") return [];
  return trimmed.split("\n").slice(-n);
}

function describeJob(job: JobResult): string {
  if (job.status === "passed") return "passed";
  if (job.failedStage) return `${job.status} at stage '${job.failedStage}'`;
  if (job.error) return `${job.status}: ${job.error.message}`;
  return job.status;
}

function describeStage(stage: StageResult): string {
  const exit = stage.status !== "passed" && stage.exitCode !== null ? ` (exit ${stage.exitCode})` : "";
  return `${STATUS_ICON[stage.status]} ${stage.label}: ${stage.status}${exit}`;
}

/** Per-job breakdown; stage detail and output tails only for jobs that did not pass. */
export function formatSummary(result: PipelineResult, outputLines = OUTPUT_TAIL_LINES): string[] {
  const { summary } = result;
  const lines = [
    "─".repeat(50),
    `Pipeline ${result.name}: ${result.status} (${summary.passed}/${summary.total} jobs passed, ${formatDuration(result.durationMs)})`,
  ];

  for (const job of result.jobs) {
    lines.push(`  ${STATUS_ICON[job.status]} ${job.name}: ${describeJob(job)}`);
    if (job.status === "passed") continue;

    const failed = job.provision.failed;
    if (failed) {
      lines.push(`      install ${failed.package} (${failed.installer}) exited ${failed.exitCode ?? "without status"}`);
      for (const line of tailLines(failed.output, outputLines)) lines.push(`      | ${line}`);
    }

    for (const stage of job.stages) {
      lines.push(`      ${describeStage(stage)}`);
      if (stage.status !== "passed" && stage.status !== "skipped") {
        for (const line of tailLines(stage.output, outputLines)) lines.push(`      | ${line}`);
      }
    }
  }

  return lines;
}
