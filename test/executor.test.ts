import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ProcessExecutor } from "../src/core/executor.js";

describe("ProcessExecutor", () => {
  let tmpDir: string;
  const executor = new ProcessExecutor({ killGraceMs: 200 });

  beforeEach(() => {
    tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "gridci-exec-")));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const sh = (script: string) => ["sh", "-c", script];

  it("captures exit status and combined output", async () => {
    const outcome = await executor.exec({
      argv: sh("echo out; echo err 1>&2; exit 3"),
      cwd: tmpDir,
      env: process.env,
    });
    expect(outcome.exitCode).toBe(3);
    expect(outcome.output).toContain("out\n");
    expect(outcome.output).toContain("err\n");
    expect(outcome.timedOut).toBe(false);
    expect(outcome.cancelled).toBe(false);
  });

  it("runs in the requested directory with the requested environment", async () => {
    const outcome = await executor.exec({
      argv: sh('printf "%s:" "$GRIDCI_TEST_VALUE"; pwd'),
      cwd: tmpDir,
      env: { ...process.env, GRIDCI_TEST_VALUE: "clang" },
    });
    expect(outcome.exitCode).toBe(0);
    expect(outcome.output).toBe(`clang:${tmpDir}\n`);
  });

  it("stops a command that outlives its timeout", async () => {
    const outcome = await executor.exec({ argv: sh("sleep 10"), cwd: tmpDir, env: process.env, timeoutMs: 100 });
    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe("SIGTERM");
  });

  it("stops a command when the signal aborts", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const outcome = await executor.exec({ argv: sh("sleep 10"), cwd: tmpDir, env: process.env, signal: controller.signal });
    expect(outcome.cancelled).toBe(true);
    expect(outcome.timedOut).toBe(false);
  });

  it("returns once the command exits even if it left a background process", async () => {
    const started = Date.now();
    const outcome = await executor.exec({ argv: sh("sleep 8 & echo started"), cwd: tmpDir, env: process.env, timeoutMs: 300 });
    expect(Date.now() - started).toBeLessThan(3000);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.output).toBe("started\n");
    expect(outcome.timedOut).toBe(false);
  });

  it("returns once the command exits when a background process holds the output under an abort signal", async () => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), 300);
    const started = Date.now();
    const outcome = await executor.exec({ argv: sh("sleep 8 & echo started"), cwd: tmpDir, env: process.env, signal: controller.signal });
    clearTimeout(timer);
    expect(Date.now() - started).toBeLessThan(3000);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.cancelled).toBe(false);
  });

  it("stops background processes when the timeout elapses", async () => {
    const started = Date.now();
    const outcome = await executor.exec({ argv: sh("sleep 8 & sleep 8"), cwd: tmpDir, env: process.env, timeoutMs: 300 });
    expect(Date.now() - started).toBeLessThan(3000);
    expect(outcome.timedOut).toBe(true);
  });

  it("kills a leftover background process that ignores SIGTERM", async () => {
    const started = Date.now();
    const outcome = await executor.exec({
      argv: sh("(trap '' TERM; sleep 8) & echo started"),
      cwd: tmpDir,
      env: process.env,
    });
    expect(Date.now() - started).toBeLessThan(3000);
    expect(outcome.exitCode).toBe(0);
    expect(outcome.output).toBe("started\n");
  });

  it("does not spawn once already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const outcome = await executor.exec({ argv: sh("touch spawned"), cwd: tmpDir, env: process.env, signal: controller.signal });
    expect(outcome.cancelled).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, "spawned"))).toBe(false);
  });

  it("keeps only the tail of large output", async () => {
    const small = new ProcessExecutor({ maxOutputBytes: 10 });
    const outcome = await small.exec({ argv: sh("printf 0123456789abcdefghij"), cwd: tmpDir, env: process.env });
    expect(outcome.output).toBe("[... output truncated ...]\nabcdefghij");
  });

  it("reports a missing program as a failed command", async () => {
    const outcome = await executor.exec({ argv: ["gridci-no-such-program"], cwd: tmpDir, env: process.env });
    expect(outcome.exitCode).toBeNull();
    expect(outcome.output).toContain("ENOENT");
  });

  it("rejects an empty command line without spawning", async () => {
    const outcome = await executor.exec({ argv: [], cwd: tmpDir, env: process.env });
    expect(outcome).toEqual({ exitCode: null, signal: null, output: "empty command\n", timedOut: false, cancelled: false });
  });
});
