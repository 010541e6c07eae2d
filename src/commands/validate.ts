import path from "node:path";
import { getParallelLayers } from "../core/dag.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { resolveSettings } from "../config/validator.js";
import { loadDefinition, planPipeline } from "../definition/loader.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";

export type ValidateResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; diagnostics: Diagnostic[] };

function toDiagnostic(e: unknown, fallbackPath: string): Diagnostic {
  if (e instanceof ConfigurationError) {
    return diag("error", e.code, e.message, { path: e.path ?? fallbackPath });
  }
  return diag("error", "INTERNAL_ERROR", errorMessage(e), { path: fallbackPath });
}

/**
 * Check settings and a pipeline definition without running anything:
 * schema, matrix expansion and the job dependency graph.
 */
export function validateDefinition(opts: {
  definition: string;
  configDir?: string;
  env?: string;
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
}): ValidateResult {
  const cwd = path.resolve(opts.cwd ?? process.cwd());
  const definitionPath = path.resolve(cwd, opts.definition);
  const diagnostics: Diagnostic[] = [];

  try {
    resolveSettings({ configDir: opts.configDir, envName: opts.env, processEnv: opts.processEnv });
  } catch (e) {
    diagnostics.push(toDiagnostic(e, opts.configDir ?? "config"));
  }

  try {
    const plan = planPipeline(loadDefinition(definitionPath));
    const layers = getParallelLayers(plan.jobs);
    diagnostics.push(
      diag("info", "OK", `${plan.name}: ${plan.jobs.length} job(s) in ${layers.length} layer(s)`, {
        path: definitionPath,
        details: { jobs: plan.jobs.map((j) => j.name) },
      }),
    );
  } catch (e) {
    diagnostics.push(toDiagnostic(e, definitionPath));
  }

  const ok = diagnostics.every((d) => d.level !== "error");
  return ok ? { ok: true, diagnostics } : { ok: false, diagnostics };
}
