import type { Command } from "./command.js";

/** argv of an external step; null disables the step. */
export type StepArgv = Command["argv"] | null;

/** Full devstrap configuration. */
export interface DevstrapConfig {
  /** Log planned commands instead of running them. */
  dry_run: boolean;
  linux: {
    /** Exit non-zero when no supported package manager is found. */
    strict_unsupported: boolean;
  };
  process_manager: {
    name: string;
    install: Command["argv"];
  };
  database: {
    create: StepArgv;
    migrate: StepArgv;
    seed: StepArgv;
  };
}
