/** Distribution family served by a package manager profile. */
export type DistroFamily = "debian" | "fedora" | "opensuse" | "arch" | "void";

/** Package manager identifiers, one per profile. */
export type PackageManagerId = "apt" | "dnf" | "zypper" | "pacman" | "xbps";

/** Privilege-escalation prefix resolved once per run; null when already privileged. */
export type PrivilegeEscalator = "sudo" | "doas" | null;

/**
 * Fixed association between a package manager, its dependency names
 * and its non-interactive install syntax.
 */
export interface PackageManagerProfile {
  readonly id: PackageManagerId;
  readonly family: DistroFamily;
  /** Executable probed on the search path; also the program the install runs. */
  readonly detect: string;
  /** Whether the install runs behind the resolved escalator. */
  readonly escalate: boolean;
  /** Install subcommand and auto-confirm flags, placed before the package list. */
  readonly install: readonly string[];
  /** Ordered, duplicate-free native dependency names in this distro's spelling. */
  readonly packages: readonly string[];
  /** Child environment; behind an escalator it is passed as env(1) assignments. */
  readonly env?: Readonly<Record<string, string>>;
}
