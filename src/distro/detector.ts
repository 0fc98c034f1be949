import type { EnvironmentProbe } from "../probe/environment.js";
import type { PackageManagerProfile } from "../types/profile.js";
import { PACKAGE_MANAGER_PROFILES } from "./profiles.js";
import { logger } from "../logger.js";

/**
 * Return the first profile whose package manager is on the search path.
 * Order is the priority: a host exposing both apt-get and dnf is treated as Debian.
 */
export function detectPackageManager(
  probe: EnvironmentProbe,
  profiles: readonly PackageManagerProfile[] = PACKAGE_MANAGER_PROFILES,
): PackageManagerProfile | null {
  for (const profile of profiles) {
    if (probe.isExecutableAvailable(profile.detect)) {
      logger.info({ profile: profile.id, family: profile.family }, "Package manager detected");
      return profile;
    }
    logger.debug({ executable: profile.detect }, "Package manager not found");
  }
  return null;
}
