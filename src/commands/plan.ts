import path from "node:path";
import { getParallelLayers } from "../core/dag.js";
import { loadDefinition, planPipeline, selectJobs } from "../definition/loader.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { JobSpec, PipelinePlan } from "../types/pipeline.js";

export type PlanView = {
  plan: PipelinePlan;
  /** Job names grouped so that every job's needs sit in an earlier layer. */
  layers: string[][];
};

/** Expand a definition into the jobs `run` would execute. Throws ConfigurationError. */
export function planDefinition(opts: { definition: string; job?: string; cwd?: string }): PlanView {
  const cwd = path.resolve(opts.cwd ?? process.cwd());
  let plan = planPipeline(loadDefinition(path.resolve(cwd, opts.definition)));
  if (opts.job) plan = selectJobs(plan, opts.job);
  return { plan, layers: getParallelLayers(plan.jobs) };
}

function formatEnv(env: Readonly<Record<string, string>>): string {
  return Object.entries(env)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");
}

function jobLines(job: JobSpec): string[] {
  const lines = [`  ${job.name}`];
  const matrix = Object.entries(job.matrix);
  if (matrix.length > 0) lines.push(`    matrix: ${matrix.map(([axis, v]) => `${axis}=${v}`).join(", ")}`);
  if (job.needs.length > 0) lines.push(`    needs: ${job.needs.join(", ")}`);
  if (Object.keys(job.env).length > 0) lines.push(`    env: ${formatEnv(job.env)}`);
  for (const p of job.provision) {
    lines.push(`    provision: ${[...p.argv, ...p.packages].join(" ")}`);
  }
  for (const stage of job.stages) {
    const timeout = stage.timeoutMs !== undefined ? ` [timeout ${stage.timeoutMs / 60000}m]` : "";
    lines.push(`    stage ${stage.label}: ${stage.command}${timeout}`);
  }
  return lines;
}

export function formatPlan(view: PlanView): string[] {
  const byName = new Map(view.plan.jobs.map((j) => [j.name, j]));
  const lines = [`Pipeline ${view.plan.name}: ${view.plan.jobs.length} job(s)`];
  view.layers.forEach((layer, i) => {
    lines.push(`Layer ${i + 1}:`);
    for (const name of layer) {
      const job = byName.get(name);
      if (job) lines.push(...jobLines(job));
    }
  });
  return lines;
}

export function planDiagnostics(view: PlanView): Diagnostic[] {
  return view.layers.flatMap((layer, i) =>
    layer.flatMap((name) => {
      const job = view.plan.jobs.find((j) => j.name === name);
      if (!job) return [];
      return [
        diag("info", "JOB", job.name, {
          details: {
            layer: i + 1,
            template: job.template,
            matrix: job.matrix,
            needs: job.needs,
            env: job.env,
            provision: job.provision,
            stages: job.stages,
          },
        }),
      ];
    }),
  );
}
