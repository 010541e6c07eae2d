import type { InstallerName } from "./pipeline.js";
import type { JobStatus, PipelineStatus, StageStatus } from "./result.js";

/** Lifecycle events emitted while a pipeline runs. */
export type PipelineEvent =
  | { type: "pipeline_started"; pipeline: string; jobs: string[] }
  | { type: "job_started"; job: string }
  | { type: "provision_package"; job: string; installer: InstallerName; package: string }
  | { type: "stage_started"; job: string; stage: string }
  | { type: "stage_finished"; job: string; stage: string; status: StageStatus; exitCode: number | null; durationMs: number }
  | { type: "job_finished"; job: string; status: JobStatus; failedStage?: string; reason?: string }
  | { type: "warning"; code: string; message: string }
  | { type: "pipeline_finished"; pipeline: string; status: PipelineStatus; durationMs: number };

export type EventSink = (event: PipelineEvent) => void;
