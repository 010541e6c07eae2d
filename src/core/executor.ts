import { spawn, type ChildProcess } from "node:child_process";

export type ExecRequest = {
  argv: readonly string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Host-enforced limit; the process group is stopped when it elapses. */
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type ExecOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Combined stdout/stderr, tail-capped. */
  output: string;
  timedOut: boolean;
  cancelled: boolean;
};

/**
 * Process host seam. Stage and provisioning code only ever talks to this,
 * so tests substitute an in-process fake.
 */
export interface CommandExecutor {
  exec(request: ExecRequest): Promise<ExecOutcome>;
}

export type ProcessExecutorOptions = {
  killGraceMs?: number;
  maxOutputBytes?: number;
};

const TRUNCATED = "[... output truncated ...]\n";

class OutputTail {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private dropped = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.bytes += chunk.length;
    while (this.bytes > this.limit && this.chunks.length > 1) {
      const head = this.chunks.shift();
      this.bytes -= head?.length ?? 0;
      this.dropped = true;
    }
  }

  text(): string {
    let buf = Buffer.concat(this.chunks);
    let dropped = this.dropped;
    if (buf.length > this.limit) {
      buf = buf.subarray(buf.length - this.limit);
      dropped = true;
    }
    return (dropped ? TRUNCATED : "") + buf.toString("utf8");
  }
}

/** Time allowed for output pipes to close after the group has been killed. */
const DRAIN_MS = 200;

function signalGroup(child: ChildProcess, sig: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    // Negative pid: the whole group started by `detached`, including
    // background children that outlive the leader.
    process.kill(-child.pid, sig);
  } catch {
    child.kill(sig);
  }
}

/** Runs commands as child processes, each in its own process group. */
export class ProcessExecutor implements CommandExecutor {
  private readonly killGraceMs: number;
  private readonly maxOutputBytes: number;

  constructor(opts: ProcessExecutorOptions = {}) {
    this.killGraceMs = opts.killGraceMs ?? 5000;
    this.maxOutputBytes = opts.maxOutputBytes ?? 1024 * 1024;
  }

  exec(request: ExecRequest): Promise<ExecOutcome> {
    const [command, ...args] = request.argv;
    if (command === undefined) {
      return Promise.resolve({ exitCode: null, signal: null, output: "empty command\n", timedOut: false, cancelled: false });
    }
    if (request.signal?.aborted) {
      return Promise.resolve({ exitCode: null, signal: null, output: "", timedOut: false, cancelled: true });
    }

    return new Promise((resolve) => {
      const output = new OutputTail(this.maxOutputBytes);
      const flags = { timedOut: false, cancelled: false, exited: false, settled: false };
      const timers = new Set<NodeJS.Timeout>();
      const after = (ms: number, fn: () => void): void => {
        timers.add(setTimeout(fn, ms));
      };

      const child = spawn(command, args, {
        cwd: request.cwd,
        env: request.env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: process.platform !== "win32",
      });
      child.stdout?.on("data", (chunk: Buffer) => output.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => output.push(chunk));

      const kill = (sig: NodeJS.Signals): void => {
        if (!flags.settled) signalGroup(child, sig);
      };
      const stop = (): void => {
        kill("SIGTERM");
        after(this.killGraceMs, () => kill("SIGKILL"));
      };

      if (request.timeoutMs !== undefined) {
        after(request.timeoutMs, () => {
          if (flags.exited) return;
          flags.timedOut = true;
          stop();
        });
      }

      const onAbort = (): void => {
        if (flags.exited) return;
        flags.cancelled = true;
        stop();
      };
      request.signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (flags.settled) return;
        flags.settled = true;
        for (const t of timers) clearTimeout(t);
        request.signal?.removeEventListener("abort", onAbort);
        resolve({ exitCode, signal, output: output.text(), timedOut: flags.timedOut, cancelled: flags.cancelled });
      };

      child.on("error", (err) => {
        output.push(Buffer.from(`${err.message}\n`));
        finish(null, null);
      });
      // The command is done once the leader exits; whatever it left running in
      // its group is stopped, and pipes still held open are dropped after the grace period.
      child.on("exit", (code, sig) => {
        flags.exited = true;
        stop();
        after(this.killGraceMs + DRAIN_MS, () => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          finish(code, sig);
        });
      });
      child.on("close", (code, sig) => finish(code, sig));
    });
  }
}
