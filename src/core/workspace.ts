import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import { simpleGit } from "simple-git";
import { WorkspaceError, errorMessage } from "./errors.js";
import type { WorkspaceStrategy } from "../types/config.js";
import type { JobSpec } from "../types/pipeline.js";

/** A job's isolated execution directory. */
export type Workspace = {
  dir: string;
  release(): Promise<void>;
};

export interface WorkspaceManager {
  readonly strategy: WorkspaceStrategy;
  acquire(job: JobSpec): Promise<Workspace>;
}

/** The slice of simple-git the worktree strategy needs. */
export interface GitRunner {
  raw(args: string[]): Promise<string>;
}

/** Filesystem-safe, collision-free directory name for a job. */
export function workspaceSlug(jobName: string): string {
  const base = jobName
    .replace(/[^a-zA-Z0-9_.-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 48);
  const hash = createHash("sha256").update(jobName).digest("hex").slice(0, 8);
  return `${base || "job"}-${hash}`;
}

function isWithinOrEqual(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/** Every job runs in the checkout itself; isolation is the caller's precondition. */
export class SharedWorkspaces implements WorkspaceManager {
  readonly strategy = "shared";

  constructor(private readonly dir: string) {}

  async acquire(): Promise<Workspace> {
    return { dir: this.dir, release: async () => undefined };
  }
}

/** Each job gets a fresh copy of the source tree under `root`. */
export class CopyWorkspaces implements WorkspaceManager {
  readonly strategy = "copy";

  constructor(
    private readonly source: string,
    private readonly root: string,
    private readonly keep = false,
  ) {}

  async acquire(job: JobSpec): Promise<Workspace> {
    const dir = path.join(this.root, workspaceSlug(job.name));
    try {
      await fs.rm(dir, { recursive: true, force: true });
      await fs.mkdir(this.root, { recursive: true });
      await fs.cp(this.source, dir, {
        recursive: true,
        verbatimSymlinks: true,
        filter: (src) => !isWithinOrEqual(this.root, path.resolve(src)),
      });
    } catch (e) {
      throw new WorkspaceError(`Failed to copy workspace for '${job.name}': ${errorMessage(e)}`);
    }

    return {
      dir,
      release: async () => {
        if (!this.keep) await fs.rm(dir, { recursive: true, force: true });
      },
    };
  }
}

/** Each job gets a detached `git worktree` of HEAD under `root`. */
export class WorktreeWorkspaces implements WorkspaceManager {
  readonly strategy = "worktree";
  private readonly git: GitRunner;

  constructor(
    repoPath: string,
    private readonly root: string,
    git?: GitRunner,
    private readonly keep = false,
  ) {
    this.git = git ?? simpleGit(repoPath);
  }

  async acquire(job: JobSpec): Promise<Workspace> {
    const dir = path.join(this.root, workspaceSlug(job.name));
    try {
      await fs.rm(dir, { recursive: true, force: true });
      await fs.mkdir(this.root, { recursive: true });
      await this.git.raw(["worktree", "add", "--detach", "--force", dir, "HEAD"]);
    } catch (e) {
      throw new WorkspaceError(`Failed to create worktree for '${job.name}': ${errorMessage(e)}`);
    }

    return {
      dir,
      release: async () => {
        if (!this.keep) await this.git.raw(["worktree", "remove", "--force", dir]);
      },
    };
  }
}

export function createWorkspaceManager(
  strategy: WorkspaceStrategy,
  opts: { source: string; root: string; keep?: boolean; git?: GitRunner },
): WorkspaceManager {
  const root = path.resolve(opts.source, opts.root);
  switch (strategy) {
    case "shared":
      return new SharedWorkspaces(opts.source);
    case "copy":
      return new CopyWorkspaces(opts.source, root, opts.keep);
    case "worktree":
      return new WorktreeWorkspaces(opts.source, root, opts.git, opts.keep);
  }
}
