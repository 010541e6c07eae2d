/** Orchestrator settings, layered config (base.yaml ← <env>.yaml ← GRIDCI_* env vars). */
export type WorkspaceStrategy = "shared" | "copy" | "worktree";

export type OutputFormat = "human" | "jsonl";

export type GridConfig = {
  schema_version: string;
  /** Upper bound on jobs running at the same time. */
  max_parallel: number;
  /** argv prefix a stage script is appended to. */
  shell: string[];
  /** Delay between SIGTERM and SIGKILL when a stage is stopped. */
  kill_grace_ms: number;
  /** Tail of combined output kept per stage. */
  max_output_bytes: number;
  workspace_strategy: WorkspaceStrategy;
  /** Parent directory of per-job workspaces (copy/worktree). */
  workspace_root: string;
  keep_workspaces: boolean;
  format: OutputFormat;
};
