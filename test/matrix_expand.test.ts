import { describe, expect, it } from "vitest";
import { expandJobs, expandMatrix, interpolateMatrix, toAxes } from "../src/matrix/expand.js";
import { ConfigurationError } from "../src/core/errors.js";
import type { PipelineDefinition } from "../src/types/pipeline.js";

function pipeline(jobs: PipelineDefinition["jobs"], env?: Record<string, string>): PipelineDefinition {
  return { schema_version: "1", name: "demo", jobs, ...(env ? { env } : {}) };
}

describe("expandMatrix", () => {
  it("yields one empty cell when there are no axes", () => {
    expect(expandMatrix([])).toEqual([{}]);
  });

  it("crosses axes in declared order", () => {
    const axes = toAxes({
      toolchain: { gcc: { CC: "gcc" }, clang: { CC: "clang" } },
      build: { debug: null, release: { OPT: "2" } },
    });
    const cells = expandMatrix(axes);
    expect(cells.map((c) => `${c.toolchain?.name}/${c.build?.name}`)).toEqual([
      "gcc/debug",
      "gcc/release",
      "clang/debug",
      "clang/release",
    ]);
    expect(cells[1]?.build?.env).toEqual({ OPT: "2" });
    expect(cells[0]?.build?.env).toEqual({});
  });

  it("drops excluded combinations", () => {
    const axes = toAxes({ os: { linux: {}, mac: {} }, cc: { gcc: {}, clang: {} } });
    const cells = expandMatrix(axes, [{ os: "mac", cc: "gcc" }]);
    expect(cells.map((c) => `${c.os?.name}-${c.cc?.name}`)).toEqual(["linux-gcc", "linux-clang", "mac-clang"]);
  });

  it("rejects an axis with no variants", () => {
    expect(() => expandMatrix(toAxes({ toolchain: {} }))).toThrow("Matrix axis 'toolchain' declares no variants");
  });

  it("rejects excludes naming unknown axes or variants", () => {
    const axes = toAxes({ cc: { gcc: {}, clang: {} } });
    expect(() => expandMatrix(axes, [{ os: "mac" }])).toThrow("Matrix exclude references unknown axis 'os'");
    expect(() => expandMatrix(axes, [{ cc: "icc" }])).toThrow(
      "Matrix exclude references unknown variant 'icc' of axis 'cc'",
    );
  });

  it("rejects excludes that remove every cell", () => {
    const axes = toAxes({ cc: { gcc: {} } });
    expect(() => expandMatrix(axes, [{ cc: "gcc" }])).toThrow("Matrix exclude removes every combination");
  });
});

describe("interpolateMatrix", () => {
  const cell = { toolchain: { name: "clang", env: {} } };

  it("substitutes variant names", () => {
    expect(interpolateMatrix("build-${{ matrix.toolchain }}", cell, "x")).toBe("build-clang");
    expect(interpolateMatrix("${{matrix.toolchain}}", cell, "x")).toBe("clang");
  });

  it("rejects unknown axes", () => {
    expect(() => interpolateMatrix("${{ matrix.os }}", cell, "job 'a' name")).toThrow(
      "Unknown matrix axis 'os' referenced in job 'a' name",
    );
  });
});

describe("expandJobs", () => {
  const toolchains = pipeline(
    {
      cpp: {
        name: "${{ matrix.toolchain }}",
        timeout_minutes: 60,
        env: { BUILD_DIR: "out-${{ matrix.toolchain }}", CC: "cc" },
        provision: [{ installer: "apt", sudo: true, packages: ["libboost-filesystem-dev"] }],
        matrix: {
          axes: {
            toolchain: {
              GCC: { CC: "gcc", CXX: "g++" },
              Clang: { CC: "clang", CXX: "clang++" },
            },
          },
        },
        stages: [
          { name: "Generator", run: "pip3 install ./gen" },
          { name: "Build and Test", run: "ci/build.sh", timeout_minutes: 30, env: { VERBOSE: "1" } },
        ],
      },
    },
    { CARGO_TERM_COLORS: "always" },
  );

  it("produces one job per variant with identical stages", () => {
    const jobs = expandJobs(toolchains);
    expect(jobs.map((j) => j.name)).toEqual(["GCC", "Clang"]);
    expect(jobs[0]?.stages.map((s) => s.label)).toEqual(jobs[1]?.stages.map((s) => s.label));
    expect(jobs[1]?.matrix).toEqual({ toolchain: "Clang" });
  });

  it("layers pipeline, job and axis environments", () => {
    const [gcc] = expandJobs(toolchains);
    expect(gcc?.env).toEqual({ CARGO_TERM_COLORS: "always", BUILD_DIR: "out-GCC", CC: "gcc", CXX: "g++" });
    expect(gcc?.stages[1]?.env).toEqual({ VERBOSE: "1" });
  });

  it("converts timeouts to milliseconds, stage over job", () => {
    const [gcc] = expandJobs(toolchains);
    expect(gcc?.stages[0]?.timeoutMs).toBe(3_600_000);
    expect(gcc?.stages[1]?.timeoutMs).toBe(1_800_000);
  });

  it("resolves installer argv", () => {
    const [gcc] = expandJobs(toolchains);
    expect(gcc?.provision).toEqual([
      {
        installer: "apt",
        argv: ["sudo", "DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", "--no-install-recommends"],
        packages: ["libboost-filesystem-dev"],
      },
    ]);
  });

  it("returns frozen specs and leaves the definition untouched", () => {
    const before = JSON.stringify(toolchains);
    const jobs = expandJobs(toolchains);
    expect(Object.isFrozen(jobs[0])).toBe(true);
    expect(Object.isFrozen(jobs[0]?.stages[0])).toBe(true);
    expect(JSON.stringify(toolchains)).toBe(before);
  });

  it("names unnamed matrix jobs after the template and variants", () => {
    const jobs = expandJobs(
      pipeline({
        test: {
          matrix: { axes: { os: { linux: null }, cc: { gcc: null, clang: null } } },
          stages: [{ name: "t", run: "make test" }],
        },
        lint: { stages: [{ name: "l", run: "make lint" }] },
      }),
    );
    expect(jobs.map((j) => j.name)).toEqual(["test (linux, gcc)", "test (linux, clang)", "lint"]);
  });

  it("links needs to every expanded job of the template", () => {
    const jobs = expandJobs(
      pipeline({
        gen: { matrix: { axes: { py: { "3.11": null, "3.12": null } } }, stages: [{ name: "g", run: "gen" }] },
        build: { needs: ["gen"], stages: [{ name: "b", run: "make" }] },
      }),
    );
    expect(jobs.find((j) => j.name === "build")?.needs).toEqual(["gen (3.11)", "gen (3.12)"]);
  });

  it("rejects empty pipelines, empty jobs, unknown needs and duplicate names", () => {
    expect(() => expandJobs(pipeline({}))).toThrow("Pipeline 'demo' declares no jobs");
    expect(() => expandJobs(pipeline({ a: { stages: [] } }))).toThrow("Job 'a' declares no stages");
    expect(() => expandJobs(pipeline({ a: { needs: ["zz"], stages: [{ name: "s", run: "x" }] } }))).toThrow(
      "Job 'a' needs unknown job 'zz'",
    );
    expect(() =>
      expandJobs(
        pipeline({
          a: { name: "same", stages: [{ name: "s", run: "x" }] },
          b: { name: "same", stages: [{ name: "s", run: "x" }] },
        }),
      ),
    ).toThrow(ConfigurationError);
  });
});
