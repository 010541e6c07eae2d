/** Pipeline definition types: the declarative document and its expanded jobs. */
export type EnvMap = Record<string, string>;

export type InstallerName = "apt" | "pip" | "npm" | "brew" | "custom";

/** One group of packages installed through the same installer. */
export type ProvisionDefinition = {
  installer: InstallerName;
  /** argv prefix, required for `custom` (e.g. ["conda", "install", "-y"]). */
  command?: string[];
  sudo?: boolean;
  packages: string[];
};

export type StageDefinition = {
  name: string;
  run: string;
  workdir?: string;
  env?: EnvMap;
  timeout_minutes?: number;
};

/** axis name → variant name → env substitutions for that variant. */
export type AxesDefinition = Record<string, Record<string, EnvMap | null>>;

export type MatrixDefinition = {
  axes: AxesDefinition;
  exclude?: Record<string, string>[];
};

export type JobDefinition = {
  /** Name pattern; may reference `${{ matrix.<axis> }}`. */
  name?: string;
  needs?: string[];
  env?: EnvMap;
  timeout_minutes?: number;
  provision?: ProvisionDefinition[];
  matrix?: MatrixDefinition;
  stages: StageDefinition[];
};

export type PipelineDefinition = {
  schema_version: string;
  name: string;
  /** Passed through untouched to the report. */
  triggers?: unknown;
  env?: EnvMap;
  jobs: Record<string, JobDefinition>;
};

export type Variant = {
  name: string;
  env: EnvMap;
};

export type Axis = {
  name: string;
  variants: Variant[];
};

/** One matrix cell: axis name → chosen variant. */
export type MatrixCell = Record<string, Variant>;

export type StageSpec = Readonly<{
  label: string;
  command: string;
  workdir?: string;
  env: Readonly<EnvMap>;
  timeoutMs?: number;
}>;

export type ProvisionSpec = Readonly<{
  installer: InstallerName;
  argv: readonly string[];
  packages: readonly string[];
}>;

export type JobSpec = Readonly<{
  name: string;
  template: string;
  /** axis name → variant name */
  matrix: Readonly<Record<string, string>>;
  env: Readonly<EnvMap>;
  provision: readonly ProvisionSpec[];
  stages: readonly StageSpec[];
  needs: readonly string[];
}>;

export type PipelinePlan = Readonly<{
  name: string;
  triggers?: unknown;
  jobs: readonly JobSpec[];
}>;
