/**
 * devstrap: developer machine bootstrap.
 *
 * Library surface behind the `devstrap` and `devstrap-linux-deps` binaries.
 */

export type { Command, DevstrapConfig, StepArgv, InstallOutcome, DistroFamily, PackageManagerId, PackageManagerProfile, PrivilegeEscalator } from "./types/index.js";
export { DevstrapError, DevstrapErrorCode, UNSUPPORTED_EXIT_CODE, exitCodeFor } from "./errors.js";
export { PathProbe, type EnvironmentProbe } from "./probe/environment.js";
export { LocalExecutor, SPAWN_FAILED_EXIT_CODE, type Executor, type ExecResult, type LocalExecutorOptions } from "./execution/executor.js";
export { PACKAGE_MANAGER_PROFILES } from "./distro/profiles.js";
export { ESCALATORS, resolvePrivilegeEscalator } from "./distro/escalator.js";
export { detectPackageManager } from "./distro/detector.js";
export { buildInstallCommand } from "./distro/commands.js";
export { installLinuxDependencies, type InstallerDeps, type InstallOptions } from "./distro/installer.js";
export { loadConfig, DEFAULT_CONFIG, type ConfigResult } from "./config/loader.js";
export { planBootstrap, type BootstrapStep, type StepResult } from "./bootstrap/steps.js";
export { runBootstrap, type StepReport } from "./bootstrap/runner.js";
export type { BootstrapContext } from "./bootstrap/context.js";
