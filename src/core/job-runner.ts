import {
  CancellationError,
  StageFailure,
  StageTimeoutError,
  WorkspaceError,
  errorMessage,
} from "./errors.js";
import type { CommandExecutor } from "./executor.js";
import { provision } from "./provisioner.js";
import { runStages } from "./stage-runner.js";
import { nextJobPhase, statusForPhase, type JobEvent } from "./state-machine.js";
import type { Workspace, WorkspaceManager } from "./workspace.js";
import type { EventSink } from "../types/events.js";
import type { JobSpec } from "../types/pipeline.js";
import type { ErrorRecord, JobPhase, JobResult, ProvisionRecord, StageResult } from "../types/result.js";

export type JobContext = {
  executor: CommandExecutor;
  workspaces: WorkspaceManager;
  shell: readonly string[];
  baseEnv?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  now?: () => Date;
  emit?: EventSink;
};

type Settled = {
  phase: JobPhase;
  startedAt: Date;
  finishedAt: Date;
  stages?: readonly StageResult[];
  provision?: ProvisionRecord;
  error?: ErrorRecord;
  failedStage?: string;
};

export function buildJobResult(job: JobSpec, s: Settled): JobResult {
  return Object.freeze({
    name: job.name,
    matrix: job.matrix,
    status: statusForPhase(s.phase),
    phase: s.phase,
    provision: s.provision ?? { installed: [] },
    stages: Object.freeze([...(s.stages ?? [])]),
    ...(s.failedStage !== undefined ? { failedStage: s.failedStage } : {}),
    ...(s.error !== undefined ? { error: s.error } : {}),
    startedAt: s.startedAt.toISOString(),
    finishedAt: s.finishedAt.toISOString(),
    durationMs: s.finishedAt.getTime() - s.startedAt.getTime(),
  });
}

/** Result for a job that never left `pending`. */
export function unstartedJob(job: JobSpec, event: "cancel" | "skip", error: ErrorRecord, at: Date): JobResult {
  return buildJobResult(job, { phase: nextJobPhase("pending", event), startedAt: at, finishedAt: at, error });
}

function stageError(halted: StageResult, timeoutMs: number | undefined): { event: JobEvent; error: ErrorRecord } {
  switch (halted.status) {
    case "cancelled":
      return { event: "cancel", error: new CancellationError(halted.label).toJSON() };
    case "timed_out":
      return { event: "stage_timed_out", error: new StageTimeoutError(halted.label, timeoutMs).toJSON() };
    default:
      return { event: "stage_failed", error: new StageFailure(halted.label, halted.exitCode).toJSON() };
  }
}

/**
 * Run one job: acquire its workspace, provision once, then run its stages fail-fast.
 * Never throws; every outcome is reported as a terminal JobResult.
 */
export async function runJob(job: JobSpec, ctx: JobContext): Promise<JobResult> {
  const now = ctx.now ?? (() => new Date());
  const emit = ctx.emit ?? (() => undefined);
  const startedAt = now();

  const finish = (s: Omit<Settled, "startedAt" | "finishedAt">): JobResult => {
    const result = buildJobResult(job, { ...s, startedAt, finishedAt: now() });
    emit({
      type: "job_finished",
      job: job.name,
      status: result.status,
      ...(result.failedStage !== undefined ? { failedStage: result.failedStage } : {}),
      ...(result.error !== undefined ? { reason: result.error.message } : {}),
    });
    return result;
  };

  if (ctx.signal?.aborted) {
    return finish({ phase: nextJobPhase("pending", "cancel"), error: new CancellationError().toJSON() });
  }

  let phase = nextJobPhase("pending", "start");
  emit({ type: "job_started", job: job.name });

  let workspace: Workspace;
  try {
    workspace = await ctx.workspaces.acquire(job);
  } catch (e) {
    const error = e instanceof WorkspaceError ? e : new WorkspaceError(errorMessage(e));
    return finish({ phase: nextJobPhase(phase, "provision_failed"), error: error.toJSON() });
  }

  const record: ProvisionRecord = { installed: [] };
  try {
    const env = { ...(ctx.baseEnv ?? process.env), ...job.env };
    const provisioned = await provision(job.provision, {
      executor: ctx.executor,
      cwd: workspace.dir,
      env,
      signal: ctx.signal,
      onPackage: (installer, pkg) => emit({ type: "provision_package", job: job.name, installer, package: pkg }),
    });
    record.installed = provisioned.installed;

    if (!provisioned.ok) {
      const err = provisioned.error;
      if (err instanceof CancellationError) {
        return finish({ phase: nextJobPhase(phase, "cancel"), provision: record, error: err.toJSON() });
      }
      record.failed = { installer: err.installer, package: err.packageName, exitCode: err.exitCode, output: err.output };
      return finish({ phase: nextJobPhase(phase, "provision_failed"), provision: record, error: err.toJSON() });
    }

    phase = nextJobPhase(phase, "provisioned");
    const { results, halted } = await runStages(job.stages, {
      executor: ctx.executor,
      shell: ctx.shell,
      workspace: workspace.dir,
      jobName: job.name,
      jobEnv: job.env,
      baseEnv: ctx.baseEnv,
      signal: ctx.signal,
      now,
      onStageStart: (stage) => emit({ type: "stage_started", job: job.name, stage: stage.label }),
      onStageEnd: (r) =>
        emit({
          type: "stage_finished",
          job: job.name,
          stage: r.label,
          status: r.status,
          exitCode: r.exitCode,
          durationMs: r.durationMs,
        }),
    });

    if (!halted) {
      return finish({ phase: nextJobPhase(phase, "all_passed"), provision: record, stages: results });
    }

    const { event, error } = stageError(halted.result, job.stages[halted.index]?.timeoutMs);
    return finish({
      phase: nextJobPhase(phase, event),
      provision: record,
      stages: results,
      failedStage: halted.result.label,
      error,
    });
  } catch (e) {
    // Executor or workspace faults outside a command's own exit status.
    const event: JobEvent = phase === "provisioning" ? "provision_failed" : "stage_failed";
    return finish({
      phase: nextJobPhase(phase, event),
      provision: record,
      error: { code: "INTERNAL_ERROR", message: errorMessage(e) },
    });
  } finally {
    try {
      await workspace.release();
    } catch (e) {
      emit({ type: "warning", code: "WORKSPACE_RELEASE_FAILED", message: `${job.name}: ${errorMessage(e)}` });
    }
  }
}
