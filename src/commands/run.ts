import path from "node:path";
import { runPipeline } from "../core/aggregator.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { ProcessExecutor, type CommandExecutor } from "../core/executor.js";
import { createWorkspaceManager, type GitRunner } from "../core/workspace.js";
import { resolveSettings } from "../config/validator.js";
import { loadDefinition, planPipeline, selectJobs } from "../definition/loader.js";
import { createEventPrinter, writeDiagnostic, type Writer } from "../report/events.js";
import { writeJsonReport } from "../report/json-report.js";
import { writeJunitReport } from "../report/junit.js";
import { formatSummary } from "../report/summary.js";
import { diag } from "../types/diagnostic.js";
import type { GridConfig, OutputFormat, WorkspaceStrategy } from "../types/config.js";
import type { PipelinePlan } from "../types/pipeline.js";
import type { ErrorRecord, PipelineResult } from "../types/result.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type RunOptions = {
  definition: string;
  configDir?: string;
  /** Settings overlay name (config/<env>.yaml). */
  env?: string;
  /** Glob over expanded job names; dependencies are pulled in. */
  job?: string;
  maxParallel?: number;
  workspace?: WorkspaceStrategy;
  format?: OutputFormat;
  report?: string;
  junit?: string;
  /** Checkout the workspaces derive from; defaults to process.cwd(). */
  cwd?: string;
  signal?: AbortSignal;
  executor?: CommandExecutor;
  git?: GitRunner;
  processEnv?: NodeJS.ProcessEnv;
  out?: Writer;
  err?: Writer;
};

export type RunCommandResult =
  | { ok: true; exitCode: ExitCode; result: PipelineResult; reportPath?: string; junitPath?: string }
  | { ok: false; exitCode: ExitCode; error: ErrorRecord & { path?: string } };

type Prepared = { settings: GridConfig; plan: PipelinePlan };

/** Settings, definition, expansion and job selection; throws ConfigurationError. */
function prepare(opts: RunOptions, cwd: string, processEnv: NodeJS.ProcessEnv): Prepared {
  const settings = resolveSettings({
    configDir: opts.configDir,
    envName: opts.env,
    processEnv,
    overrides: {
      max_parallel: opts.maxParallel,
      workspace_strategy: opts.workspace,
      format: opts.format,
    },
  });
  let plan = planPipeline(loadDefinition(path.resolve(cwd, opts.definition)));
  if (opts.job) plan = selectJobs(plan, opts.job);
  return { settings, plan };
}

export async function run(opts: RunOptions): Promise<RunCommandResult> {
  const cwd = path.resolve(opts.cwd ?? process.cwd());
  const processEnv = opts.processEnv ?? process.env;
  const io = { out: opts.out ?? process.stdout, err: opts.err ?? process.stderr };

  let prepared: Prepared;
  try {
    prepared = prepare(opts, cwd, processEnv);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return {
        ok: false,
        exitCode: EXIT.INVALID_DEFINITION,
        error: { ...e.toJSON(), ...(e.path !== undefined ? { path: e.path } : {}) },
      };
    }
    throw e;
  }

  const { settings, plan } = prepared;
  const format = settings.format;

  const result = await runPipeline(plan, {
    executor:
      opts.executor ??
      new ProcessExecutor({ killGraceMs: settings.kill_grace_ms, maxOutputBytes: settings.max_output_bytes }),
    workspaces: createWorkspaceManager(settings.workspace_strategy, {
      source: cwd,
      root: settings.workspace_root,
      keep: settings.keep_workspaces,
      git: opts.git,
    }),
    shell: settings.shell,
    maxParallel: settings.max_parallel,
    signal: opts.signal,
    baseEnv: processEnv,
    onEvent: createEventPrinter(format, io),
  });

  if (format === "human") {
    for (const line of formatSummary(result)) io.out.write(line + "\n");
  }

  const written: { reportPath?: string; junitPath?: string } = {};
  try {
    if (opts.report) written.reportPath = writeJsonReport(path.resolve(cwd, opts.report), result);
    if (opts.junit) written.junitPath = writeJunitReport(path.resolve(cwd, opts.junit), result);
  } catch (e) {
    // The exit code still follows the pipeline status.
    writeDiagnostic(diag("warn", "REPORT_WRITE_FAILED", errorMessage(e)), format, io);
  }

  return { ok: true, exitCode: exitCodeFor(result.status), result, ...written };
}
