import { describe, expect, it } from "vitest";
import { classifyOutcome, runStage, runStages, stageEnv } from "../src/core/stage-runner.js";
import { FakeExecutor, stage, tickingClock } from "./helpers.js";
import type { StageContext } from "../src/core/stage-runner.js";

function context(executor: FakeExecutor, extra: Partial<StageContext> = {}): StageContext {
  return {
    executor,
    shell: ["bash", "-e", "-c"],
    workspace: "/work",
    jobName: "GCC",
    jobEnv: { CC: "gcc", CXX: "g++" },
    baseEnv: { PATH: "/usr/bin", CC: "cc" },
    now: tickingClock(),
    ...extra,
  };
}

describe("stageEnv", () => {
  it("layers ambient, job and stage variables under the CI markers", () => {
    const env = stageEnv(stage("b", "make", { env: { CXX: "clang++" } }), context(new FakeExecutor()));
    expect(env).toEqual({
      PATH: "/usr/bin",
      CC: "gcc",
      CXX: "clang++",
      CI: "true",
      GRIDCI: "true",
      GRIDCI_JOB: "GCC",
      GRIDCI_WORKSPACE: "/work",
    });
  });
});

describe("classifyOutcome", () => {
  const base = { exitCode: 0, signal: null, output: "", timedOut: false, cancelled: false };

  it("orders cancellation over timeout over exit status", () => {
    expect(classifyOutcome(base)).toBe("passed");
    expect(classifyOutcome({ ...base, exitCode: 2 })).toBe("failed");
    expect(classifyOutcome({ ...base, exitCode: null, timedOut: true })).toBe("timed_out");
    expect(classifyOutcome({ ...base, exitCode: null, timedOut: true, cancelled: true })).toBe("cancelled");
  });
});

describe("runStage", () => {
  it("runs the command through the shell in the stage workdir", async () => {
    const executor = new FakeExecutor(() => ({ output: "ok\n" }));
    const result = await runStage(
      stage("Build and Test", "ci/build.sh", { workdir: "cpp", timeoutMs: 1000 }),
      context(executor),
    );

    expect(executor.calls[0]?.argv).toEqual(["bash", "-e", "-c", "ci/build.sh"]);
    expect(executor.calls[0]?.cwd).toBe("/work/cpp");
    expect(executor.calls[0]?.timeoutMs).toBe(1000);
    expect(result).toEqual({
      label: "Build and Test",
      status: "passed",
      exitCode: 0,
      signal: null,
      output: "ok\n",
      startedAt: "2024-01-01T00:00:00.000Z",
      finishedAt: "2024-01-01T00:00:01.000Z",
      durationMs: 1000,
    });
  });

  it("does not start a stage once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const executor = new FakeExecutor();
    const started: string[] = [];
    const result = await runStage(
      stage("b", "make"),
      context(executor, { signal: controller.signal, onStageStart: (s) => started.push(s.label) }),
    );
    expect(result.status).toBe("cancelled");
    expect(executor.calls).toHaveLength(0);
    expect(started).toEqual([]);
  });
});

describe("runStages", () => {
  it("halts at the first failure and skips the rest", async () => {
    const executor = new FakeExecutor((req) => (req.argv.includes("gen") ? { exitCode: 1, output: "boom\n" } : {}));
    const ended: string[] = [];
    const { results, halted } = await runStages(
      [stage("setup", "setup"), stage("generate", "gen"), stage("build", "make")],
      context(executor, { onStageEnd: (r) => ended.push(`${r.label}:${r.status}`) }),
    );

    expect(results.map((r) => r.status)).toEqual(["passed", "failed", "skipped"]);
    expect(halted?.index).toBe(1);
    expect(halted?.result.label).toBe("generate");
    expect(halted?.result.exitCode).toBe(1);
    expect(executor.commands()).toEqual(["setup", "gen"]);
    expect(ended).toEqual(["setup:passed", "generate:failed"]);
    expect(results[2]).toMatchObject({ startedAt: null, finishedAt: null, durationMs: 0 });
  });

  it("reports timeouts distinctly", async () => {
    const executor = new FakeExecutor(() => ({ exitCode: null, signal: "SIGTERM", timedOut: true }));
    const { results, halted } = await runStages([stage("slow", "sleep 99"), stage("next", "true")], context(executor));
    expect(results.map((r) => r.status)).toEqual(["timed_out", "skipped"]);
    expect(halted?.result.signal).toBe("SIGTERM");
  });

  it("has no halted stage when everything passes", async () => {
    const outcome = await runStages([stage("a", "a"), stage("b", "b")], context(new FakeExecutor()));
    expect(outcome.halted).toBeUndefined();
    expect(outcome.results.map((r) => r.status)).toEqual(["passed", "passed"]);
  });
});
