import type { Command } from "./command.js";
import type { PackageManagerProfile, PrivilegeEscalator } from "./profile.js";

/** Result of one dependency-installer run. */
export type InstallOutcome =
  | { readonly status: "installed"; readonly profile: PackageManagerProfile; readonly command: Command }
  | { readonly status: "planned"; readonly profile: PackageManagerProfile; readonly command: Command }
  | { readonly status: "failed"; readonly profile: PackageManagerProfile; readonly command: Command; readonly exitCode: number }
  | { readonly status: "unsupported"; readonly escalator: PrivilegeEscalator };
