import type { CommandExecutor, ExecOutcome, ExecRequest } from "../src/core/executor.js";
import type { Workspace, WorkspaceManager } from "../src/core/workspace.js";
import type { JobSpec, StageSpec } from "../src/types/pipeline.js";

export type Script = (req: ExecRequest) => Partial<ExecOutcome> | Promise<Partial<ExecOutcome>>;

/** Records every request; outcomes default to a clean exit 0. */
export class FakeExecutor implements CommandExecutor {
  readonly calls: ExecRequest[] = [];

  constructor(private readonly script: Script = () => ({})) {}

  async exec(req: ExecRequest): Promise<ExecOutcome> {
    this.calls.push(req);
    const outcome = await this.script(req);
    return { exitCode: 0, signal: null, output: "", timedOut: false, cancelled: false, ...outcome };
  }

  /** The script each stage ran (last argv element), in call order. */
  commands(): string[] {
    return this.calls.map((c) => c.argv[c.argv.length - 1] ?? "");
  }
}

export class FakeWorkspaces implements WorkspaceManager {
  readonly strategy = "shared";
  readonly released: string[] = [];

  constructor(private readonly dir = "/work") {}

  async acquire(job: JobSpec): Promise<Workspace> {
    return {
      dir: this.dir,
      release: async () => {
        this.released.push(job.name);
      },
    };
  }
}

export function stage(label: string, command: string, extra: Partial<StageSpec> = {}): StageSpec {
  return { label, command, env: {}, ...extra };
}

export function jobSpec(name: string, extra: Partial<JobSpec> = {}): JobSpec {
  return {
    name,
    template: name,
    matrix: {},
    env: {},
    provision: [],
    stages: [stage("build", `build ${name}`)],
    needs: [],
    ...extra,
  };
}

/** Clock that advances one second per reading. */
export function tickingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let t = start;
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}
