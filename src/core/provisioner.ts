import { CancellationError, ConfigurationError, ProvisioningError } from "./errors.js";
import type { CommandExecutor } from "./executor.js";
import type { InstallerName, ProvisionDefinition, ProvisionSpec } from "../types/pipeline.js";

/** argv prefix per installer; the package identifier is appended. */
export const INSTALLERS: Record<Exclude<InstallerName, "custom">, readonly string[]> = {
  apt: ["apt-get", "install", "-y", "--no-install-recommends"],
  pip: ["pip3", "install"],
  npm: ["npm", "install", "--no-save"],
  brew: ["brew", "install"],
};

export function resolveInstaller(group: ProvisionDefinition, where: string): string[] {
  const base = group.installer === "custom" ? group.command : INSTALLERS[group.installer];
  if (!base || base.length === 0) {
    throw new ConfigurationError(`${where}: installer '${group.installer}' requires a non-empty command`);
  }
  if (!group.sudo) return [...base];
  // sudo resets the environment, so apt's setting travels on the command line.
  return group.installer === "apt" ? ["sudo", "DEBIAN_FRONTEND=noninteractive", ...base] : ["sudo", ...base];
}

export type ProvisionContext = {
  executor: CommandExecutor;
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  onPackage?: (installer: InstallerName, pkg: string) => void;
};

export type ProvisionOutcome =
  | { ok: true; installed: string[] }
  | { ok: false; installed: string[]; error: ProvisioningError | CancellationError };

/**
 * Install every package, one installer invocation per package so a failure
 * names the dependency. Stops at the first failure.
 */
export async function provision(specs: readonly ProvisionSpec[], ctx: ProvisionContext): Promise<ProvisionOutcome> {
  const installed: string[] = [];

  for (const spec of specs) {
    const env = spec.installer === "apt" ? { ...ctx.env, DEBIAN_FRONTEND: "noninteractive" } : ctx.env;

    for (const pkg of spec.packages) {
      if (ctx.signal?.aborted) {
        return { ok: false, installed, error: new CancellationError() };
      }

      ctx.onPackage?.(spec.installer, pkg);
      const outcome = await ctx.executor.exec({
        argv: [...spec.argv, pkg],
        cwd: ctx.cwd,
        env,
        signal: ctx.signal,
      });

      if (outcome.cancelled) {
        return { ok: false, installed, error: new CancellationError() };
      }
      if (outcome.exitCode !== 0) {
        return {
          ok: false,
          installed,
          error: new ProvisioningError(spec.installer, pkg, outcome.exitCode, outcome.output),
        };
      }
      installed.push(pkg);
    }
  }

  return { ok: true, installed };
}
