// Bootstrap steps. Each step is one external invocation (or the in-process
// Linux installer) and reports a StepResult; none of them inspects output.
import type { BootstrapContext } from "./context.js";
import type { Command } from "../types/command.js";
import type { StepArgv } from "../types/config.js";
import { installLinuxDependencies } from "../distro/installer.js";
import { logger } from "../logger.js";

export type StepResult =
  | { readonly status: "ok" }
  | { readonly status: "skipped"; readonly reason: string }
  | { readonly status: "failed"; readonly exitCode: number };

export interface BootstrapStep {
  readonly name: string;
  run(ctx: BootstrapContext): Promise<StepResult>;
}

/** Run a command unless dry-run is on; non-zero exit is a failed step. */
async function runCommand(ctx: BootstrapContext, step: string, command: Command): Promise<StepResult> {
  if (ctx.config.dry_run) {
    logger.info({ step, argv: command.argv }, "Dry run: command not executed");
    return { status: "ok" };
  }
  const result = await ctx.executor.execute(command);
  if (result.exitCode !== 0) return { status: "failed", exitCode: result.exitCode };
  return { status: "ok" };
}

/** Native libraries through the distro package manager. */
export const linuxDependenciesStep: BootstrapStep = {
  name: "linux-dependencies",
  async run(ctx) {
    const outcome = await installLinuxDependencies(ctx, { dryRun: ctx.config.dry_run });
    switch (outcome.status) {
      case "installed":
      case "planned":
        return { status: "ok" };
      case "failed":
        return { status: "failed", exitCode: outcome.exitCode };
      case "unsupported":
        // Database steps do not need the native libraries; keep going.
        return { status: "skipped", reason: "unsupported Linux distribution" };
    }
  },
};

/** Process manager via Homebrew, only when it is not already installed. */
export const processManagerStep: BootstrapStep = {
  name: "process-manager",
  async run(ctx) {
    const { name, install } = ctx.config.process_manager;
    if (ctx.probe.isExecutableAvailable(name)) {
      return { status: "skipped", reason: `${name} already installed` };
    }
    return runCommand(ctx, "process-manager", { argv: install });
  },
};

function databaseStep(name: string, select: (ctx: BootstrapContext) => StepArgv): BootstrapStep {
  return {
    name,
    async run(ctx) {
      const argv = select(ctx);
      if (argv === null) return { status: "skipped", reason: "disabled in configuration" };
      return runCommand(ctx, name, { argv });
    },
  };
}

export const databaseCreateStep = databaseStep("database-create", (ctx) => ctx.config.database.create);
export const databaseMigrateStep = databaseStep("database-migrate", (ctx) => ctx.config.database.migrate);
export const databaseSeedStep = databaseStep("database-seed", (ctx) => ctx.config.database.seed);

/** Ordered steps for a platform: platform dependencies first, then the database. */
export function planBootstrap(platform: NodeJS.Platform): BootstrapStep[] {
  return [
    platform === "linux" ? linuxDependenciesStep : processManagerStep,
    databaseCreateStep,
    databaseMigrateStep,
    databaseSeedStep,
  ];
}
