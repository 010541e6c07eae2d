import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry. Discovers the *.schema.json files (pipeline definition,
 * settings, report) and compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string) {}

  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "pipeline.schema.json" → "pipeline"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Type guard over a named schema; `errorsFor(name)` explains a `false`. */
  matches<T>(name: string, data: unknown): data is T {
    return this.validator(name)(data);
  }

  /** Errors from the most recent validation against `name`. */
  errorsFor(name: string): string {
    return this.ajv.errorsText(this.validator(name).errors, { dataVar: name });
  }

  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const valid = this.matches<unknown>(name, data);
    return { valid, errors: valid ? null : this.errorsFor(name) };
  }
}

/** Extract a semver-like version from the schema's $id (e.g. "...pipeline@1.0.0"). */
function extractVersion(schema: unknown): string | null {
  if (schema !== null && typeof schema === "object" && "$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m?.[1]) return m[1];
  }
  return null;
}

export function createRegistry(schemaDir: string = SCHEMA_DIR): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir);
  registry.load();
  return registry;
}
