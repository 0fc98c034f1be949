// CLI command bodies. Each returns the process exit status instead of exiting,
// so the entry points stay one line and the exit-code mapping is testable.
import type { EnvironmentProbe } from "../probe/environment.js";
import type { Executor } from "../execution/executor.js";
import type { InstallOutcome } from "../types/install.js";
import { PathProbe } from "../probe/environment.js";
import { LocalExecutor } from "../execution/executor.js";
import { loadConfig } from "../config/loader.js";
import { installLinuxDependencies } from "../distro/installer.js";
import { runBootstrap } from "../bootstrap/runner.js";
import { DevstrapError, DevstrapErrorCode, exitCodeFor } from "../errors.js";
import { logger } from "../logger.js";

export interface CliDeps {
  readonly probe: EnvironmentProbe;
  readonly executor: Executor;
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
}

export function defaultCliDeps(): CliDeps {
  const searchPath = process.env.PATH ?? "";
  return {
    probe: new PathProbe(searchPath),
    executor: new LocalExecutor({ searchPath }),
    platform: process.platform,
    env: process.env,
    cwd: process.cwd(),
  };
}

/**
 * Raise the error matching an unsuccessful installer outcome.
 * Unsupported hosts only raise in strict mode.
 */
export function checkOutcome(outcome: InstallOutcome, strictUnsupported: boolean): void {
  switch (outcome.status) {
    case "installed":
    case "planned":
      return;
    case "failed":
      throw new DevstrapError(DevstrapErrorCode.INSTALL_FAILED, `${outcome.profile.detect} exited with status ${outcome.exitCode}`, {
        profile: outcome.profile.id,
        exitCode: outcome.exitCode,
      });
    case "unsupported":
      if (strictUnsupported) {
        throw new DevstrapError(DevstrapErrorCode.UNSUPPORTED_PLATFORM, "Unsupported Linux distribution");
      }
      return;
  }
}

export async function linuxDepsCommand(args: readonly string[], deps: CliDeps): Promise<number> {
  warnIgnoredArgs(args);
  try {
    const { config } = loadConfig(deps.env.DEVSTRAP_CONFIG, deps.cwd);
    const outcome = await installLinuxDependencies(deps, { dryRun: config.dry_run });
    checkOutcome(outcome, config.linux.strict_unsupported);
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

export async function bootstrapCommand(args: readonly string[], deps: CliDeps): Promise<number> {
  warnIgnoredArgs(args);
  try {
    const { config, configPath, fromFile } = loadConfig(deps.env.DEVSTRAP_CONFIG, deps.cwd);
    logger.info({ configPath: fromFile ? configPath : null, platform: deps.platform }, "Starting bootstrap");
    await runBootstrap({ config, probe: deps.probe, executor: deps.executor, platform: deps.platform });
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function warnIgnoredArgs(args: readonly string[]): void {
  if (args.length > 0) logger.warn({ args }, "devstrap takes no arguments; ignoring them");
}

function reportError(err: unknown): number {
  if (err instanceof DevstrapError) {
    logger.error({ code: err.code, ...err.context }, err.message);
  } else {
    logger.error({ error: err }, "Unexpected error");
  }
  return exitCodeFor(err);
}
