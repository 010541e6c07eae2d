import { ConfigurationError } from "../core/errors.js";
import { resolveInstaller } from "../core/provisioner.js";
import type {
  Axis,
  AxesDefinition,
  EnvMap,
  JobDefinition,
  JobSpec,
  MatrixCell,
  PipelineDefinition,
  ProvisionSpec,
  StageSpec,
} from "../types/pipeline.js";

const MATRIX_REF = /\$\{\{\s*matrix\.([A-Za-z0-9_-]+)\s*\}\}/g;

/** Convert the YAML axes mapping into ordered axes (declaration order is kept). */
export function toAxes(axes: AxesDefinition): Axis[] {
  return Object.entries(axes).map(([name, variants]) => ({
    name,
    variants: Object.entries(variants).map(([variant, env]) => ({ name: variant, env: { ...(env ?? {}) } })),
  }));
}

/**
 * Cross product of all axes, in declared axis order then declared variant order.
 * No axes yields one empty cell. `exclude` entries drop every cell matching all their keys.
 */
export function expandMatrix(axes: Axis[], exclude: Record<string, string>[] = []): MatrixCell[] {
  for (const axis of axes) {
    if (axis.variants.length === 0) {
      throw new ConfigurationError(`Matrix axis '${axis.name}' declares no variants`);
    }
  }

  for (const entry of exclude) {
    for (const [axisName, variantName] of Object.entries(entry)) {
      const axis = axes.find((a) => a.name === axisName);
      if (!axis) throw new ConfigurationError(`Matrix exclude references unknown axis '${axisName}'`);
      if (!axis.variants.some((v) => v.name === variantName)) {
        throw new ConfigurationError(`Matrix exclude references unknown variant '${variantName}' of axis '${axisName}'`);
      }
    }
  }

  let cells: MatrixCell[] = [{}];
  for (const axis of axes) {
    const next: MatrixCell[] = [];
    for (const cell of cells) {
      for (const variant of axis.variants) {
        next.push({ ...cell, [axis.name]: variant });
      }
    }
    cells = next;
  }

  const kept = cells.filter(
    (cell) => !exclude.some((entry) => Object.entries(entry).every(([axisName, v]) => cell[axisName]?.name === v)),
  );
  if (kept.length === 0) {
    throw new ConfigurationError("Matrix exclude removes every combination");
  }
  return kept;
}

/** Replace `${{ matrix.<axis> }}` with the cell's variant name. */
export function interpolateMatrix(text: string, cell: MatrixCell, where: string): string {
  return text.replace(MATRIX_REF, (_match, axisName: string) => {
    const variant = cell[axisName];
    if (!variant) {
      throw new ConfigurationError(`Unknown matrix axis '${axisName}' referenced in ${where}`);
    }
    return variant.name;
  });
}

function interpolateEnv(env: EnvMap | undefined, cell: MatrixCell, where: string): EnvMap {
  const out: EnvMap = {};
  for (const [key, value] of Object.entries(env ?? {})) {
    out[key] = interpolateMatrix(String(value), cell, `${where} env ${key}`);
  }
  return out;
}

function minutesToMs(minutes: number | undefined): number | undefined {
  return minutes === undefined ? undefined : Math.round(minutes * 60_000);
}

function jobName(template: string, job: JobDefinition, axes: Axis[], cell: MatrixCell): string {
  if (job.name) return interpolateMatrix(job.name, cell, `job '${template}' name`);
  if (axes.length === 0) return template;
  return `${template} (${axes.map((a) => cell[a.name]?.name ?? "").join(", ")})`;
}

type UnlinkedJob = Omit<JobSpec, "needs">;

function buildJob(
  template: string,
  job: JobDefinition,
  axes: Axis[],
  cell: MatrixCell,
  pipelineEnv: EnvMap,
): UnlinkedJob {
  const where = `job '${template}'`;
  const env: EnvMap = { ...pipelineEnv, ...interpolateEnv(job.env, cell, where) };
  for (const axis of axes) {
    Object.assign(env, cell[axis.name]?.env ?? {});
  }

  const stages: StageSpec[] = job.stages.map((stage, i) => {
    const at = `${where} stage ${i + 1}`;
    const timeoutMs = minutesToMs(stage.timeout_minutes ?? job.timeout_minutes);
    return Object.freeze({
      label: interpolateMatrix(stage.name, cell, `${at} name`),
      command: interpolateMatrix(stage.run, cell, `${at} run`),
      ...(stage.workdir !== undefined ? { workdir: interpolateMatrix(stage.workdir, cell, `${at} workdir`) } : {}),
      env: Object.freeze(interpolateEnv(stage.env, cell, at)),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    });
  });

  const provision: ProvisionSpec[] = (job.provision ?? []).map((group, i) =>
    Object.freeze({
      installer: group.installer,
      argv: Object.freeze(resolveInstaller(group, `${where} provision ${i + 1}`)),
      packages: Object.freeze(group.packages.map((p) => interpolateMatrix(p, cell, `${where} provision ${i + 1}`))),
    }),
  );

  const matrix: Record<string, string> = {};
  for (const axis of axes) {
    matrix[axis.name] = cell[axis.name]?.name ?? "";
  }

  return {
    name: jobName(template, job, axes, cell),
    template,
    matrix: Object.freeze(matrix),
    env: Object.freeze(env),
    provision: Object.freeze(provision),
    stages: Object.freeze(stages),
  };
}

/**
 * Expand every job template into one JobSpec per matrix cell.
 * Pure: the definition is not modified and the returned specs are frozen.
 */
export function expandJobs(definition: PipelineDefinition): JobSpec[] {
  const templates = Object.entries(definition.jobs ?? {});
  if (templates.length === 0) {
    throw new ConfigurationError(`Pipeline '${definition.name}' declares no jobs`);
  }

  const byTemplate = new Map<string, UnlinkedJob[]>();
  for (const [template, job] of templates) {
    if (!job.stages || job.stages.length === 0) {
      throw new ConfigurationError(`Job '${template}' declares no stages`);
    }
    const axes = job.matrix ? toAxes(job.matrix.axes) : [];
    const cells = expandMatrix(axes, job.matrix?.exclude ?? []);
    byTemplate.set(
      template,
      cells.map((cell) => buildJob(template, job, axes, cell, definition.env ?? {})),
    );
  }

  const seen = new Set<string>();
  const specs: JobSpec[] = [];
  for (const [template, job] of templates) {
    const needs: string[] = [];
    for (const dep of job.needs ?? []) {
      const depJobs = byTemplate.get(dep);
      if (!depJobs) {
        throw new ConfigurationError(`Job '${template}' needs unknown job '${dep}'`);
      }
      needs.push(...depJobs.map((j) => j.name));
    }

    for (const unlinked of byTemplate.get(template) ?? []) {
      if (seen.has(unlinked.name)) {
        throw new ConfigurationError(`Duplicate job name '${unlinked.name}'`);
      }
      seen.add(unlinked.name);
      specs.push(Object.freeze({ ...unlinked, needs: Object.freeze([...needs]) }));
    }
  }

  return specs;
}
