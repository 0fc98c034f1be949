// Package manager profiles, in probe priority order.
// Adding a distribution means appending a profile here. When a native
// dependency is added, add its spelling to every profile so the lists stay
// equivalent: audio, fonts, display server, keyboard, TLS, compression, GPU loader.
import type { PackageManagerProfile } from "../types/profile.js";

function profile(p: PackageManagerProfile): PackageManagerProfile {
  return Object.freeze({
    ...p,
    install: Object.freeze([...p.install]),
    packages: Object.freeze([...p.packages]),
    ...(p.env ? { env: Object.freeze({ ...p.env }) } : {}),
  });
}

export const PACKAGE_MANAGER_PROFILES: readonly PackageManagerProfile[] = Object.freeze([
  // Ubuntu, Debian, etc.: https://packages.ubuntu.com/
  profile({
    id: "apt",
    family: "debian",
    detect: "apt-get",
    escalate: true,
    install: ["install", "-y"],
    packages: [
      "libasound2-dev",
      "libfontconfig-dev",
      "libwayland-dev",
      "libxkbcommon-x11-dev",
      "libssl-dev",
      "libzstd-dev",
      "libvulkan1",
    ],
    env: { DEBIAN_FRONTEND: "noninteractive" },
  }),
  // Fedora, CentOS, RHEL, etc.: https://packages.fedoraproject.org/
  profile({
    id: "dnf",
    family: "fedora",
    detect: "dnf",
    escalate: true,
    install: ["install", "-y"],
    packages: [
      "alsa-lib-devel",
      "fontconfig-devel",
      "wayland-devel",
      "libxkbcommon-x11-devel",
      "openssl-devel",
      "libzstd-devel",
      "vulkan-loader",
    ],
  }),
  // openSUSE: https://software.opensuse.org/
  profile({
    id: "zypper",
    family: "opensuse",
    detect: "zypper",
    escalate: true,
    install: ["install", "-y"],
    packages: [
      "alsa-devel",
      "fontconfig-devel",
      "wayland-devel",
      "libxkbcommon-x11-devel",
      "openssl-devel",
      "libzstd-devel",
      "libvulkan1",
    ],
  }),
  // Arch, Manjaro, etc.: https://archlinux.org/packages
  profile({
    id: "pacman",
    family: "arch",
    detect: "pacman",
    escalate: true,
    install: ["-S", "--needed", "--noconfirm"],
    packages: [
      "alsa-lib",
      "fontconfig",
      "wayland",
      "libxkbcommon-x11",
      "openssl",
      "zstd",
      "vulkan-loader",
    ],
  }),
  // Void: https://voidlinux.org/packages/
  profile({
    id: "xbps",
    family: "void",
    detect: "xbps-install",
    escalate: true,
    install: ["-S", "-y", "-u"],
    packages: [
      "alsa-lib-devel",
      "fontconfig-devel",
      "libxcb-devel",
      "libxkbcommon-devel",
      "libzstd-devel",
      "openssl-devel",
      "wayland-devel",
      "vulkan-loader",
    ],
  }),
]);
