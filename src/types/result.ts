/** Run results: stage, job and pipeline outcomes. */
export type StageStatus = "passed" | "failed" | "timed_out" | "cancelled" | "skipped";

export type JobStatus = "passed" | "failed" | "timed_out" | "cancelled" | "skipped";

export type PipelineStatus = "passed" | "failed" | "cancelled";

export type JobPhase =
  | "pending"
  | "provisioning"
  | "running"
  | "provision_failed"
  | "stage_failed"
  | "stage_timed_out"
  | "all_stages_passed"
  | "cancelled"
  | "skipped";

export type ErrorRecord = {
  code: string;
  message: string;
};

export type StageResult = Readonly<{
  label: string;
  status: StageStatus;
  exitCode: number | null;
  signal: string | null;
  output: string;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number;
}>;

export type ProvisionRecord = {
  installed: string[];
  failed?: { installer: string; package: string; exitCode: number | null; output: string };
};

export type JobResult = Readonly<{
  name: string;
  matrix: Readonly<Record<string, string>>;
  status: JobStatus;
  phase: JobPhase;
  provision: ProvisionRecord;
  stages: readonly StageResult[];
  failedStage?: string;
  error?: ErrorRecord;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}>;

export type PipelineSummary = {
  total: number;
  passed: number;
  failed: number;
  timed_out: number;
  cancelled: number;
  skipped: number;
};

export type PipelineResult = Readonly<{
  name: string;
  triggers?: unknown;
  status: PipelineStatus;
  passed: boolean;
  jobs: readonly JobResult[];
  summary: PipelineSummary;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}>;
