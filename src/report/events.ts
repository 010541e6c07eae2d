import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { OutputFormat } from "../types/config.js";
import type { EventSink, PipelineEvent } from "../types/events.js";
import type { JobStatus, StageStatus } from "../types/result.js";

export type Writer = { write(chunk: string): unknown };

export const STATUS_ICON: Record<JobStatus | StageStatus, string> = {
  passed: "✓",
  failed: "✗",
  timed_out: "⏱",
  cancelled: "⊘",
  skipped: "-",
};

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function levelFor(status: JobStatus | StageStatus): Diagnostic["level"] {
  if (status === "passed" || status === "skipped") return "info";
  if (status === "cancelled") return "warn";
  return "error";
}

/** Every event becomes a diagnostic: a message for humans, the fields for jsonl. */
export function toDiagnostic(event: PipelineEvent): Diagnostic {
  const { type, ...fields } = event;
  const code = type.toUpperCase();
  const details: Record<string, unknown> = { ...fields };

  switch (event.type) {
    case "pipeline_started":
      return diag("info", code, `Pipeline ${event.pipeline}: ${event.jobs.length} job(s)`, { details });
    case "job_started":
      return diag("info", code, `[${event.job}] started`, { details });
    case "provision_package":
      return diag("info", code, `[${event.job}] install (${event.installer}) ${event.package}`, { details });
    case "stage_started":
      return diag("info", code, `[${event.job}] ▶ ${event.stage}`, { details });
    case "stage_finished": {
      const exit = event.status !== "passed" && event.exitCode !== null ? ` (exit ${event.exitCode})` : "";
      return diag(
        levelFor(event.status),
        code,
        `[${event.job}] ${STATUS_ICON[event.status]} ${event.stage}: ${event.status}${exit} in ${formatDuration(event.durationMs)}`,
        { details },
      );
    }
    case "job_finished": {
      const where = event.failedStage
        ? ` at stage '${event.failedStage}'`
        : event.reason && event.status !== "passed"
          ? `: ${event.reason}`
          : "";
      return diag(levelFor(event.status), code, `[${event.job}] ${event.status}${where}`, { details });
    }
    case "warning":
      return diag("warn", event.code, event.message);
    case "pipeline_finished":
      return diag(
        event.status === "passed" ? "info" : "error",
        code,
        `Pipeline ${event.pipeline} ${event.status} in ${formatDuration(event.durationMs)}`,
        { details },
      );
  }
}

/** jsonl: every diagnostic on stdout. human: bare messages on stdout, prefixed ones on stderr. */
export function writeDiagnostic(
  d: Diagnostic,
  format: OutputFormat,
  io: { out: Writer; err: Writer },
  toErr = d.level !== "info",
): void {
  if (format === "jsonl") {
    io.out.write(JSON.stringify(d) + "\n");
  } else if (toErr) {
    io.err.write(`${d.level === "warn" ? "warning" : "error"}: ${d.message}\n`);
  } else {
    io.out.write(d.message + "\n");
  }
}

/** Lifecycle events go to stdout whatever their level; only warnings go to stderr. */
export function createEventPrinter(format: OutputFormat, io: { out: Writer; err: Writer }): EventSink {
  return (event) => writeDiagnostic(toDiagnostic(event), format, io, event.type === "warning");
}
