import type { ErrorRecord } from "../types/result.js";

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "PROVISIONING_ERROR"
  | "WORKSPACE_ERROR"
  | "STAGE_FAILURE"
  | "STAGE_TIMEOUT"
  | "CANCELLED";

/** Base class for every error the orchestrator classifies. */
export class OrchestratorError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): ErrorRecord {
    return { code: this.code, message: this.message };
  }
}

/** Malformed or empty definition; raised before any job is scheduled. */
export class ConfigurationError extends OrchestratorError {
  constructor(
    message: string,
    readonly path?: string,
  ) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class ProvisioningError extends OrchestratorError {
  constructor(
    readonly installer: string,
    readonly packageName: string,
    readonly exitCode: number | null,
    readonly output: string,
  ) {
    super("PROVISIONING_ERROR", `${installer}: failed to install '${packageName}' (exit ${exitCode ?? "none"})`);
  }
}

export class WorkspaceError extends OrchestratorError {
  constructor(message: string) {
    super("WORKSPACE_ERROR", message);
  }
}

export class StageFailure extends OrchestratorError {
  constructor(
    readonly stage: string,
    readonly exitCode: number | null,
  ) {
    super("STAGE_FAILURE", `Stage '${stage}' failed (exit ${exitCode ?? "none"})`);
  }
}

export class StageTimeoutError extends OrchestratorError {
  constructor(
    readonly stage: string,
    readonly timeoutMs: number | undefined,
  ) {
    super(
      "STAGE_TIMEOUT",
      timeoutMs === undefined
        ? `Stage '${stage}' timed out`
        : `Stage '${stage}' timed out after ${Math.round(timeoutMs / 1000)}s`,
    );
  }
}

export class CancellationError extends OrchestratorError {
  constructor(readonly stage?: string) {
    super("CANCELLED", stage ? `Cancelled during stage '${stage}'` : "Cancelled");
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
