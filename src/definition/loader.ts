import fs from "node:fs";
import YAML from "yaml";
import { minimatch } from "minimatch";
import { validateDag, withDependencies } from "../core/dag.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { expandJobs } from "../matrix/expand.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { PipelineDefinition, PipelinePlan } from "../types/pipeline.js";

/** Parse and schema-check a definition document. */
export function parseDefinition(
  text: string,
  source = "<inline>",
  registry: SchemaRegistry = createRegistry(),
): PipelineDefinition {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${source}: ${errorMessage(e)}`, source);
  }

  if (!registry.matches<PipelineDefinition>("pipeline", doc)) {
    throw new ConfigurationError(`Invalid pipeline definition (${source}): ${registry.errorsFor("pipeline")}`, source);
  }
  return doc;
}

export function loadDefinition(filePath: string, registry?: SchemaRegistry): PipelineDefinition {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new ConfigurationError(`Pipeline definition not found: ${filePath}`, filePath);
  }
  return parseDefinition(fs.readFileSync(filePath, "utf8"), filePath, registry);
}

/** Expand and validate; every ConfigurationError surfaces here, before any job runs. */
export function planPipeline(definition: PipelineDefinition): PipelinePlan {
  const jobs = expandJobs(definition);
  validateDag(jobs);
  return Object.freeze({
    name: definition.name,
    ...(definition.triggers !== undefined ? { triggers: definition.triggers } : {}),
    jobs: Object.freeze(jobs),
  });
}

/**
 * Keep the jobs whose names match `pattern`, plus their dependencies.
 */
export function selectJobs(plan: PipelinePlan, pattern: string): PipelinePlan {
  const matched = plan.jobs.filter((j) => minimatch(j.name, pattern)).map((j) => j.name);
  if (matched.length === 0) {
    throw new ConfigurationError(
      `No job matches '${pattern}'. Available jobs: ${plan.jobs.map((j) => j.name).join(", ")}`,
    );
  }
  const keep = withDependencies(plan.jobs, matched);
  return Object.freeze({ ...plan, jobs: Object.freeze(plan.jobs.filter((j) => keep.has(j.name))) });
}
