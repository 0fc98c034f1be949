import type { EnvironmentProbe } from "../probe/environment.js";
import type { PrivilegeEscalator } from "../types/profile.js";
import { logger } from "../logger.js";

/** Escalators in preference order. */
export const ESCALATORS = ["sudo", "doas"] as const;

/**
 * Resolve the privilege-escalation prefix for this run.
 * Returns null when neither is installed; the caller is assumed to be
 * privileged already (e.g. root inside a container).
 */
export function resolvePrivilegeEscalator(probe: EnvironmentProbe): PrivilegeEscalator {
  const escalator = ESCALATORS.find((name) => probe.isExecutableAvailable(name)) ?? null;
  if (escalator === null) {
    logger.info("Neither sudo nor doas found; running package manager without escalation");
  } else {
    logger.debug({ escalator }, "Privilege escalator resolved");
  }
  return escalator;
}
