export type { Command } from "./command.js";
export type { DevstrapConfig, StepArgv } from "./config.js";
export type { InstallOutcome } from "./install.js";
export type { DistroFamily, PackageManagerId, PackageManagerProfile, PrivilegeEscalator } from "./profile.js";
