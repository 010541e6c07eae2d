import { validateDag } from "./dag.js";
import { CancellationError, errorMessage } from "./errors.js";
import type { CommandExecutor } from "./executor.js";
import { buildJobResult, runJob, unstartedJob } from "./job-runner.js";
import type { WorkspaceManager } from "./workspace.js";
import type { EventSink } from "../types/events.js";
import type { JobSpec, PipelinePlan } from "../types/pipeline.js";
import type { JobResult, PipelineResult, PipelineStatus, PipelineSummary } from "../types/result.js";

export const DEFAULT_SHELL: readonly string[] = ["bash", "-e", "-c"];

export type RunPipelineOptions = {
  executor: CommandExecutor;
  workspaces: WorkspaceManager;
  shell?: readonly string[];
  /** Upper bound on concurrently running jobs; defaults to all of them. */
  maxParallel?: number;
  signal?: AbortSignal;
  baseEnv?: NodeJS.ProcessEnv;
  now?: () => Date;
  onEvent?: EventSink;
};

/** passed iff every job passed; any failure, timeout or dependency skip fails the pipeline. */
export function pipelineStatus(jobs: readonly JobResult[]): PipelineStatus {
  if (jobs.every((j) => j.status === "passed")) return "passed";
  if (jobs.some((j) => j.status === "failed" || j.status === "timed_out" || j.status === "skipped")) return "failed";
  return "cancelled";
}

export function summarize(jobs: readonly JobResult[]): PipelineSummary {
  const summary: PipelineSummary = { total: jobs.length, passed: 0, failed: 0, timed_out: 0, cancelled: 0, skipped: 0 };
  for (const job of jobs) summary[job.status]++;
  return summary;
}

/**
 * Run every job of the plan. Jobs run concurrently (bounded by `maxParallel`)
 * and never share state; a job starts once all of its `needs` are terminal and
 * is skipped if any of them did not pass. Resolves once every job is terminal.
 */
export async function runPipeline(plan: PipelinePlan, opts: RunPipelineOptions): Promise<PipelineResult> {
  validateDag(plan.jobs);

  const now = opts.now ?? (() => new Date());
  const emit: EventSink = opts.onEvent ?? (() => undefined);
  const limit = Math.max(1, opts.maxParallel ?? plan.jobs.length);
  const startedAt = now();

  emit({ type: "pipeline_started", pipeline: plan.name, jobs: plan.jobs.map((j) => j.name) });

  const results = new Map<string, JobResult>();
  const pending = new Map<string, JobSpec>(plan.jobs.map((j) => [j.name, j]));
  const running = new Map<string, Promise<void>>();

  const settle = (result: JobResult): void => {
    results.set(result.name, result);
  };

  const launch = (job: JobSpec): void => {
    const jobStarted = now();
    const task = runJob(job, {
      executor: opts.executor,
      workspaces: opts.workspaces,
      shell: opts.shell ?? DEFAULT_SHELL,
      baseEnv: opts.baseEnv,
      signal: opts.signal,
      now,
      emit,
    })
      .catch((e: unknown) =>
        buildJobResult(job, {
          phase: "stage_failed",
          startedAt: jobStarted,
          finishedAt: now(),
          error: { code: "INTERNAL_ERROR", message: errorMessage(e) },
        }),
      )
      .then((result) => {
        settle(result);
        running.delete(job.name);
      });
    running.set(job.name, task);
  };

  while (pending.size > 0 || running.size > 0) {
    let progressed = false;

    for (const job of [...pending.values()]) {
      if (opts.signal?.aborted) {
        pending.delete(job.name);
        const result = unstartedJob(job, "cancel", new CancellationError().toJSON(), now());
        settle(result);
        emit({ type: "job_finished", job: job.name, status: result.status, reason: "Cancelled" });
        progressed = true;
        continue;
      }

      const deps = job.needs.map((name) => results.get(name));
      if (deps.some((d) => d === undefined)) continue;

      const blocker = deps.find((d) => d !== undefined && d.status !== "passed");
      if (blocker) {
        pending.delete(job.name);
        const reason = `Dependency '${blocker.name}' ${blocker.status}`;
        const result = unstartedJob(job, "skip", { code: "DEPENDENCY_NOT_PASSED", message: reason }, now());
        settle(result);
        emit({ type: "job_finished", job: job.name, status: result.status, reason });
        progressed = true;
        continue;
      }

      if (running.size >= limit) continue;
      pending.delete(job.name);
      launch(job);
      progressed = true;
    }

    if (progressed) continue;
    if (running.size === 0) {
      throw new Error(`Unable to schedule jobs: ${[...pending.keys()].join(", ")}`);
    }
    await Promise.race(running.values());
  }

  // Expansion order, independent of completion order.
  const jobs = plan.jobs.flatMap((j) => {
    const r = results.get(j.name);
    return r ? [r] : [];
  });
  const status = pipelineStatus(jobs);
  const finishedAt = now();
  const durationMs = finishedAt.getTime() - startedAt.getTime();

  emit({ type: "pipeline_finished", pipeline: plan.name, status, durationMs });

  return Object.freeze({
    name: plan.name,
    ...(plan.triggers !== undefined ? { triggers: plan.triggers } : {}),
    status,
    passed: status === "passed",
    jobs,
    summary: summarize(jobs),
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs,
  });
}
