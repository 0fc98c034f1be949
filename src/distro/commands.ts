// Builds the single install invocation for a detected package manager.
// sudo (env_reset) and doas (no keepenv) drop the caller's environment, so a
// profile's env goes into argv through env(1) whenever an escalator runs it.
import type { Command } from "../types/command.js";
import type { PackageManagerProfile, PrivilegeEscalator } from "../types/profile.js";

export function buildInstallCommand(profile: PackageManagerProfile, escalator: PrivilegeEscalator): Command {
  const rest = [...profile.install, ...profile.packages];

  if (profile.escalate && escalator !== null) {
    const assignments = Object.entries(profile.env ?? {}).map(([key, value]) => `${key}=${value}`);
    const argv: [string, ...string[]] =
      assignments.length > 0
        ? [escalator, "env", ...assignments, profile.detect, ...rest]
        : [escalator, profile.detect, ...rest];
    return { argv };
  }

  const argv: [string, ...string[]] = [profile.detect, ...rest];
  return profile.env ? { argv, env: profile.env } : { argv };
}
