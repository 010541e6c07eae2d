import path from "node:path";
import type { CommandExecutor, ExecOutcome } from "./executor.js";
import type { EnvMap, StageSpec } from "../types/pipeline.js";
import type { StageResult, StageStatus } from "../types/result.js";

export type StageContext = {
  executor: CommandExecutor;
  /** argv prefix the stage script is appended to, e.g. ["bash", "-e", "-c"]. */
  shell: readonly string[];
  workspace: string;
  jobName: string;
  jobEnv: Readonly<EnvMap>;
  /** Ambient environment; defaults to process.env. */
  baseEnv?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  now?: () => Date;
  onStageStart?: (stage: StageSpec) => void;
  onStageEnd?: (result: StageResult) => void;
};

export type StagesOutcome = {
  results: StageResult[];
  /** First stage that did not pass, by position; everything after it was skipped. */
  halted?: { index: number; result: StageResult };
};

/** ambient ← job ← stage ← CI markers */
export function stageEnv(stage: StageSpec, ctx: StageContext): NodeJS.ProcessEnv {
  return {
    ...(ctx.baseEnv ?? process.env),
    ...ctx.jobEnv,
    ...stage.env,
    CI: "true",
    GRIDCI: "true",
    GRIDCI_JOB: ctx.jobName,
    GRIDCI_WORKSPACE: ctx.workspace,
  };
}

export function classifyOutcome(outcome: ExecOutcome): StageStatus {
  if (outcome.cancelled) return "cancelled";
  if (outcome.timedOut) return "timed_out";
  return outcome.exitCode === 0 ? "passed" : "failed";
}

export function skippedStage(stage: StageSpec): StageResult {
  return Object.freeze({
    label: stage.label,
    status: "skipped",
    exitCode: null,
    signal: null,
    output: "",
    startedAt: null,
    finishedAt: null,
    durationMs: 0,
  });
}

export async function runStage(stage: StageSpec, ctx: StageContext): Promise<StageResult> {
  const now = ctx.now ?? (() => new Date());
  const started = now();

  let outcome: ExecOutcome;
  if (ctx.signal?.aborted) {
    outcome = { exitCode: null, signal: null, output: "", timedOut: false, cancelled: true };
  } else {
    ctx.onStageStart?.(stage);
    outcome = await ctx.executor.exec({
      argv: [...ctx.shell, stage.command],
      cwd: path.resolve(ctx.workspace, stage.workdir ?? "."),
      env: stageEnv(stage, ctx),
      timeoutMs: stage.timeoutMs,
      signal: ctx.signal,
    });
  }

  const finished = now();
  const result: StageResult = Object.freeze({
    label: stage.label,
    status: classifyOutcome(outcome),
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    output: outcome.output,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationMs: finished.getTime() - started.getTime(),
  });
  ctx.onStageEnd?.(result);
  return result;
}

/** Run stages in declared order; the first stage that does not pass halts the rest. */
export async function runStages(stages: readonly StageSpec[], ctx: StageContext): Promise<StagesOutcome> {
  const results: StageResult[] = [];
  let halted: StagesOutcome["halted"];

  for (const [index, stage] of stages.entries()) {
    if (halted) {
      results.push(skippedStage(stage));
      continue;
    }
    const result = await runStage(stage, ctx);
    results.push(result);
    if (result.status !== "passed") halted = { index, result };
  }

  return halted ? { results, halted } : { results };
}
