import type { JobPhase, JobStatus } from "../types/result.js";

/**
 * Events that drive job phase transitions.
 */
export type JobEvent =
  | "start"
  | "provisioned"
  | "provision_failed"
  | "stage_failed"
  | "stage_timed_out"
  | "all_passed"
  | "cancel"
  | "skip";

/**
 * pending → provisioning → { provision_failed | running → { stage_failed | stage_timed_out | all_stages_passed } }
 * with cancelled reachable from every live phase and skipped only from pending.
 */
const TRANSITIONS: Record<JobPhase, Partial<Record<JobEvent, JobPhase>>> = {
  pending: { start: "provisioning", cancel: "cancelled", skip: "skipped" },
  provisioning: { provisioned: "running", provision_failed: "provision_failed", cancel: "cancelled" },
  running: {
    stage_failed: "stage_failed",
    stage_timed_out: "stage_timed_out",
    all_passed: "all_stages_passed",
    cancel: "cancelled",
  },
  provision_failed: {},
  stage_failed: {},
  stage_timed_out: {},
  all_stages_passed: {},
  cancelled: {},
  skipped: {},
};

/**
 * Pure function: given current phase + event, return next phase.
 */
export function nextJobPhase(current: JobPhase, event: JobEvent): JobPhase {
  const next = TRANSITIONS[current][event];
  if (!next) {
    throw new Error(`Illegal job transition: ${current} --${event}-->`);
  }
  return next;
}

export function isTerminalPhase(phase: JobPhase): boolean {
  return Object.keys(TRANSITIONS[phase]).length === 0;
}

/** Collapse a terminal phase into the job's reported classification. */
export function statusForPhase(phase: JobPhase): JobStatus {
  switch (phase) {
    case "all_stages_passed":
      return "passed";
    case "provision_failed":
    case "stage_failed":
      return "failed";
    case "stage_timed_out":
      return "timed_out";
    case "cancelled":
      return "cancelled";
    case "skipped":
      return "skipped";
    default:
      throw new Error(`Job phase '${phase}' is not terminal`);
  }
}
