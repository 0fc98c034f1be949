import { PACKAGE_MANAGER_PROFILES } from '../../../src/distro/profiles.js';

describe('PACKAGE_MANAGER_PROFILES', () => {
  it('lists the five managers in probe priority order', () => {
    expect(PACKAGE_MANAGER_PROFILES.map((p) => p.detect)).toEqual(['apt-get', 'dnf', 'zypper', 'pacman', 'xbps-install']);
    expect(PACKAGE_MANAGER_PROFILES.map((p) => p.family)).toEqual(['debian', 'fedora', 'opensuse', 'arch', 'void']);
  });

  it.each(PACKAGE_MANAGER_PROFILES.map((p) => [p.id, p] as const))('%s has a duplicate-free package list', (_id, profile) => {
    expect(profile.packages.length).toBeGreaterThan(0);
    expect(new Set(profile.packages).size).toBe(profile.packages.length);
  });

  it('does not share package spellings between Debian and Arch', () => {
    const [apt, , , pacman] = PACKAGE_MANAGER_PROFILES;
    const aptNames = new Set(apt.packages);
    expect(pacman.packages.filter((name) => aptNames.has(name))).toEqual([]);
  });

  it('uses auto-confirm flags for every manager', () => {
    const flags = Object.fromEntries(PACKAGE_MANAGER_PROFILES.map((p) => [p.id, p.install.join(' ')]));
    expect(flags).toEqual({
      apt: 'install -y',
      dnf: 'install -y',
      zypper: 'install -y',
      pacman: '-S --needed --noconfirm',
      xbps: '-S -y -u',
    });
  });

  it.each(PACKAGE_MANAGER_PROFILES.map((p) => [p.id, p] as const))(
    '%s install arguments carry a standalone auto-confirm flag',
    (_id, profile) => {
      expect(profile.install.some((arg) => ['-y', '--yes', '--noconfirm'].includes(arg))).toBe(true);
    },
  );

  it('is frozen', () => {
    expect(Object.isFrozen(PACKAGE_MANAGER_PROFILES)).toBe(true);
    for (const profile of PACKAGE_MANAGER_PROFILES) {
      expect(Object.isFrozen(profile)).toBe(true);
      expect(Object.isFrozen(profile.packages)).toBe(true);
    }
  });
});
