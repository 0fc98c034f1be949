// Linux dependency installer: escalator → package manager → one install call.
// Stops after the first detected manager whatever its outcome; there is no
// retry and no fallback to a lower-priority manager.
import type { EnvironmentProbe } from "../probe/environment.js";
import type { Executor } from "../execution/executor.js";
import type { InstallOutcome } from "../types/install.js";
import type { PackageManagerProfile } from "../types/profile.js";
import { resolvePrivilegeEscalator } from "./escalator.js";
import { detectPackageManager } from "./detector.js";
import { buildInstallCommand } from "./commands.js";
import { PACKAGE_MANAGER_PROFILES } from "./profiles.js";
import { logger } from "../logger.js";

export interface InstallerDeps {
  readonly probe: EnvironmentProbe;
  readonly executor: Executor;
  readonly profiles?: readonly PackageManagerProfile[];
}

export interface InstallOptions {
  /** Resolve and log the install command without running it. */
  readonly dryRun?: boolean;
}

export async function installLinuxDependencies(deps: InstallerDeps, options: InstallOptions = {}): Promise<InstallOutcome> {
  const profiles = deps.profiles ?? PACKAGE_MANAGER_PROFILES;
  const escalator = resolvePrivilegeEscalator(deps.probe);
  const profile = detectPackageManager(deps.probe, profiles);

  if (profile === null) {
    logger.error(
      { searched: profiles.map((p) => p.detect) },
      "Unsupported Linux distribution: no known package manager found",
    );
    if (logger.isLevelEnabled("debug")) {
      logger.debug({ executables: deps.probe.listExecutables() }, "Executables on search path");
    }
    return { status: "unsupported", escalator };
  }

  const command = buildInstallCommand(profile, escalator);
  if (options.dryRun) {
    logger.info({ profile: profile.id, argv: command.argv }, "Dry run: install command not executed");
    return { status: "planned", profile, command };
  }

  logger.info({ profile: profile.id, escalator, packages: profile.packages.length }, "Installing native dependencies");
  const result = await deps.executor.execute(command);
  if (result.exitCode !== 0) {
    logger.error({ profile: profile.id, exitCode: result.exitCode, signal: result.signal }, "Package manager install failed");
    return { status: "failed", profile, command, exitCode: result.exitCode };
  }

  logger.info({ profile: profile.id, durationMs: result.durationMs }, "Native dependencies installed");
  return { status: "installed", profile, command };
}
