import fs from "node:fs";
import path from "node:path";
import { XMLBuilder } from "fast-xml-parser";
import type { JobResult, PipelineResult, StageResult } from "../types/result.js";

type XmlNode = Record<string, unknown>;

// Characters XML 1.0 cannot carry, e.g. from terminal escape sequences in build output.
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

function xmlText(text: string): string {
  return text.replace(INVALID_XML_CHARS, "");
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function stageCase(job: JobResult, stage: StageResult): XmlNode {
  const node: XmlNode = { "@_name": stage.label, "@_classname": job.name, "@_time": seconds(stage.durationMs) };
  switch (stage.status) {
    case "failed":
      node.failure = {
        "@_message": `exit ${stage.exitCode ?? "none"}`,
        "@_type": "failed",
        "#text": xmlText(stage.output),
      };
      break;
    case "timed_out":
      node.failure = { "@_message": job.error?.message ?? "timed out", "@_type": "timeout", "#text": xmlText(stage.output) };
      break;
    case "cancelled":
      node.skipped = { "@_message": "cancelled" };
      break;
    case "skipped":
      node.skipped = { "@_message": "not run" };
      break;
    case "passed":
      break;
  }
  return node;
}

/** Stand-in case for a job that never reached its stages. */
function jobCase(job: JobResult): XmlNode {
  const failed = job.provision.failed;
  const node: XmlNode = { "@_name": failed ? "provision" : "job", "@_classname": job.name, "@_time": seconds(job.durationMs) };
  const message = job.error?.message ?? job.status;
  if (job.status === "failed" || job.status === "timed_out") {
    node.failure = { "@_message": message, "@_type": job.phase, "#text": xmlText(failed?.output ?? "") };
  } else if (job.status !== "passed") {
    node.skipped = { "@_message": message };
  }
  return node;
}

function suite(job: JobResult): XmlNode {
  const cases = job.stages.length > 0 ? job.stages.map((s) => stageCase(job, s)) : [jobCase(job)];
  return {
    "@_name": job.name,
    "@_tests": cases.length,
    "@_failures": cases.filter((c) => c.failure !== undefined).length,
    "@_skipped": cases.filter((c) => c.skipped !== undefined).length,
    "@_time": seconds(job.durationMs),
    testcase: cases,
  };
}

/** One testsuite per job, one testcase per stage. */
export function buildJunitXml(result: PipelineResult): string {
  const suites = result.jobs.map(suite);
  const count = (key: string) => suites.reduce((n, s) => n + Number(s[key]), 0);

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });

  const body = builder.build({
    testsuites: {
      "@_name": result.name,
      "@_tests": count("@_tests"),
      "@_failures": count("@_failures"),
      "@_skipped": count("@_skipped"),
      "@_time": seconds(result.durationMs),
      testsuite: suites,
    },
  });

  return `<?xml version="1.0" encoding="UTF-8"?>\n${body}`;
}

export function writeJunitReport(filePath: string, result: PipelineResult): string {
  const fullPath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, buildJunitXml(result), "utf8");
  return fullPath;
}
