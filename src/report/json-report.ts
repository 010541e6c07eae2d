import fs from "node:fs";
import path from "node:path";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ErrorRecord, JobPhase, JobStatus, PipelineResult, PipelineStatus, PipelineSummary, StageStatus } from "../types/result.js";

export const REPORT_SCHEMA_VERSION = "1.0.0";

export type StageReport = {
  label: string;
  status: StageStatus;
  exit_code: number | null;
  signal: string | null;
  output: string;
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number;
};

export type JobReport = {
  name: string;
  matrix: Record<string, string>;
  status: JobStatus;
  phase: JobPhase;
  failed_stage?: string;
  error?: ErrorRecord;
  provision: {
    installed: string[];
    failed?: { installer: string; package: string; exit_code: number | null; output: string };
  };
  stages: StageReport[];
  started_at: string;
  finished_at: string;
  duration_ms: number;
};

export type PipelineReport = {
  schema_version: typeof REPORT_SCHEMA_VERSION;
  generated_at: string;
  name: string;
  triggers?: unknown;
  status: PipelineStatus;
  passed: boolean;
  summary: PipelineSummary;
  jobs: JobReport[];
  started_at: string;
  finished_at: string;
  duration_ms: number;
};

export function buildReport(result: PipelineResult, generatedAt: Date = new Date()): PipelineReport {
  return {
    schema_version: REPORT_SCHEMA_VERSION,
    generated_at: generatedAt.toISOString(),
    name: result.name,
    ...(result.triggers !== undefined ? { triggers: result.triggers } : {}),
    status: result.status,
    passed: result.passed,
    summary: { ...result.summary },
    jobs: result.jobs.map((job) => {
      const failed = job.provision.failed;
      return {
        name: job.name,
        matrix: { ...job.matrix },
        status: job.status,
        phase: job.phase,
        ...(job.failedStage !== undefined ? { failed_stage: job.failedStage } : {}),
        ...(job.error !== undefined ? { error: { ...job.error } } : {}),
        provision: {
          installed: [...job.provision.installed],
          ...(failed
            ? {
                failed: {
                  installer: failed.installer,
                  package: failed.package,
                  exit_code: failed.exitCode,
                  output: failed.output,
                },
              }
            : {}),
        },
        stages: job.stages.map((s) => ({
          label: s.label,
          status: s.status,
          exit_code: s.exitCode,
          signal: s.signal,
          output: s.output,
          started_at: s.startedAt,
          finished_at: s.finishedAt,
          duration_ms: s.durationMs,
        })),
        started_at: job.startedAt,
        finished_at: job.finishedAt,
        duration_ms: job.durationMs,
      };
    }),
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    duration_ms: result.durationMs,
  };
}

/**
 * Write the JSON report after checking it against `report.schema.json`.
 * Returns the absolute path written.
 */
export function writeJsonReport(
  filePath: string,
  result: PipelineResult,
  registry: SchemaRegistry = createRegistry(),
): string {
  const report = buildReport(result);
  const check = registry.validate("report", report);
  if (!check.valid) {
    throw new Error(`Report does not match schema: ${check.errors}`);
  }

  const fullPath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, JSON.stringify(report, null, 2) + "\n", "utf8");
  return fullPath;
}
