#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { run } from "./commands/run.js";
import { validateDefinition } from "./commands/validate.js";
import { formatPlan, planDefinition, planDiagnostics } from "./commands/plan.js";
import { EXIT } from "./commands/exit-codes.js";
import { ConfigurationError, errorMessage } from "./core/errors.js";
import { writeDiagnostic } from "./report/events.js";
import { diag, type Diagnostic } from "./types/diagnostic.js";
import type { OutputFormat, WorkspaceStrategy } from "./types/config.js";

const io = { out: process.stdout, err: process.stderr };

function positiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return Number(value);
}

function formatOption(defaultValue?: OutputFormat): Option {
  const option = new Option("--format <format>", "Output format").choices(["human", "jsonl"]);
  return defaultValue ? option.default(defaultValue) : option;
}

function printError(d: Diagnostic, format: OutputFormat): void {
  if (format === "jsonl") {
    writeDiagnostic(d, format, io);
  } else {
    io.err.write(`error: ${d.message}${d.path ? ` (${d.path})` : ""}\n`);
  }
}

const program = new Command();

program
  .name("gridci")
  .description("Run build-matrix pipelines: one job per toolchain combination")
  .version("0.1.0")
  .exitOverride();

program
  .command("run")
  .description("Expand the matrix and run every job; exit 0 iff all jobs pass")
  .argument("<definition>", "Pipeline definition (YAML)")
  .option("--config <dir>", "Settings directory (base.yaml, <env>.yaml)")
  .option("--env <name>", "Settings overlay to apply, e.g. ci")
  .option("--job <glob>", "Only run jobs whose name matches (plus their needs)")
  .option("--max-parallel <n>", "Jobs to run at once", positiveInt)
  .addOption(new Option("--workspace <strategy>", "Per-job workspace").choices(["shared", "copy", "worktree"]))
  .addOption(formatOption())
  .option("--report <file>", "Write a JSON report")
  .option("--junit <file>", "Write a JUnit XML report")
  .action(
    async (
      definition: string,
      opts: {
        config?: string;
        env?: string;
        job?: string;
        maxParallel?: number;
        workspace?: WorkspaceStrategy;
        format?: OutputFormat;
        report?: string;
        junit?: string;
      },
    ) => {
      const controller = new AbortController();
      const abort = () => controller.abort();
      process.once("SIGINT", abort);
      process.once("SIGTERM", abort);

      try {
        const res = await run({
          definition,
          configDir: opts.config,
          env: opts.env,
          job: opts.job,
          maxParallel: opts.maxParallel,
          workspace: opts.workspace,
          format: opts.format,
          report: opts.report,
          junit: opts.junit,
          signal: controller.signal,
          ...io,
        });

        if (!res.ok) {
          const { code, message, path } = res.error;
          printError(diag("error", code, message, path ? { path } : undefined), opts.format ?? "human");
        }
        process.exitCode = res.exitCode;
      } finally {
        process.off("SIGINT", abort);
        process.off("SIGTERM", abort);
      }
    },
  );

program
  .command("validate")
  .description("Check settings and a pipeline definition without running it")
  .argument("<definition>", "Pipeline definition (YAML)")
  .option("--config <dir>", "Settings directory")
  .option("--env <name>", "Settings overlay to apply")
  .addOption(formatOption("human"))
  .action((definition: string, opts: { config?: string; env?: string; format: OutputFormat }) => {
    const res = validateDefinition({ definition, configDir: opts.config, env: opts.env });
    for (const d of res.diagnostics) {
      if (d.level === "error") printError(d, opts.format);
      else writeDiagnostic(d, opts.format, io);
    }
    process.exitCode = res.ok ? EXIT.SUCCESS : EXIT.INVALID_DEFINITION;
  });

program
  .command("plan")
  .description("Print the expanded jobs, their environment and stages")
  .argument("<definition>", "Pipeline definition (YAML)")
  .option("--job <glob>", "Only show jobs whose name matches (plus their needs)")
  .addOption(formatOption("human"))
  .action((definition: string, opts: { job?: string; format: OutputFormat }) => {
    try {
      const view = planDefinition({ definition, job: opts.job });
      if (opts.format === "jsonl") {
        for (const d of planDiagnostics(view)) writeDiagnostic(d, "jsonl", io);
      } else {
        for (const line of formatPlan(view)) io.out.write(line + "\n");
      }
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      printError(diag("error", e.code, e.message, e.path ? { path: e.path } : undefined), opts.format);
      process.exitCode = EXIT.INVALID_DEFINITION;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // Usage errors were already printed by commander; --help and --version exit 0.
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  }
  process.stderr.write(JSON.stringify({ ok: false, error: errorMessage(err) }) + "\n");
  process.exit(EXIT.PIPELINE_FAILED);
});
