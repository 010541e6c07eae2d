import type { PipelineStatus } from "../types/result.js";

/**
 * CLI exit codes. 0 iff the pipeline passed; invoking systems gate on that alone.
 */
export const EXIT = {
  SUCCESS: 0,
  PIPELINE_FAILED: 1,
  INVALID_DEFINITION: 2,
  INVALID_ARGS: 3,
  CANCELLED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(status: PipelineStatus): ExitCode {
  switch (status) {
    case "passed":
      return EXIT.SUCCESS;
    case "failed":
      return EXIT.PIPELINE_FAILED;
    case "cancelled":
      return EXIT.CANCELLED;
  }
}
