import fs from 'fs';
import os from 'os';
import path from 'path';
import { bootstrapCommand, checkOutcome, linuxDepsCommand, type CliDeps } from '../../../src/cli/commands.js';
import { DevstrapErrorCode } from '../../../src/errors.js';
import { PACKAGE_MANAGER_PROFILES } from '../../../src/distro/profiles.js';
import type { Command } from '../../../src/types/command.js';
import { FakeProbe, RecordingExecutor } from '../../helpers/fakes.js';

describe('CLI commands', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devstrap-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const deps = (executables: string[], executor: RecordingExecutor, platform: NodeJS.Platform = 'linux'): CliDeps => ({
    probe: new FakeProbe(executables),
    executor,
    platform,
    env: {},
    cwd: tmpDir,
  });

  describe('linuxDepsCommand', () => {
    it('exits 0 after a successful install', async () => {
      const executor = new RecordingExecutor();
      expect(await linuxDepsCommand([], deps(['sudo', 'apt-get'], executor))).toBe(0);
      expect(executor.calls).toHaveLength(1);
    });

    it('exits with the package manager status on failure', async () => {
      const executor = new RecordingExecutor({ pacman: 100 });
      expect(await linuxDepsCommand([], deps(['pacman'], executor))).toBe(100);
    });

    it('exits 2 on an unsupported distribution', async () => {
      expect(await linuxDepsCommand([], deps([], new RecordingExecutor()))).toBe(2);
    });

    it('exits 0 on an unsupported distribution when strict mode is off', async () => {
      fs.writeFileSync(path.join(tmpDir, 'devstrap.yaml'), 'linux:\n  strict_unsupported: false\n');
      expect(await linuxDepsCommand([], deps([], new RecordingExecutor()))).toBe(0);
    });

    it('ignores stray arguments', async () => {
      const executor = new RecordingExecutor();
      expect(await linuxDepsCommand(['--force'], deps(['dnf'], executor))).toBe(0);
      expect(executor.argvs[0]?.[0]).toBe('dnf');
    });

    it('exits 1 on an invalid config file', async () => {
      fs.writeFileSync(path.join(tmpDir, 'devstrap.yaml'), 'dry_run: maybe\n');
      const executor = new RecordingExecutor();
      expect(await linuxDepsCommand([], deps(['apt-get'], executor))).toBe(1);
      expect(executor.calls).toEqual([]);
    });

    it('reads the config named by DEVSTRAP_CONFIG', async () => {
      fs.writeFileSync(path.join(tmpDir, 'ci.yaml'), 'dry_run: true\n');
      const executor = new RecordingExecutor();
      const cli = { ...deps(['apt-get'], executor), env: { DEVSTRAP_CONFIG: 'ci.yaml' } };
      expect(await linuxDepsCommand([], cli)).toBe(0);
      expect(executor.calls).toEqual([]);
    });
  });

  describe('bootstrapCommand', () => {
    it('exits 0 when every step succeeds', async () => {
      const executor = new RecordingExecutor();
      expect(await bootstrapCommand([], deps(['foreman'], executor, 'darwin'))).toBe(0);
      expect(executor.calls).toHaveLength(3);
    });

    it('exits with the failing step status', async () => {
      const executor = new RecordingExecutor({ 'script/seed-db': 42 });
      expect(await bootstrapCommand([], deps(['xbps-install'], executor))).toBe(42);
      expect(executor.calls).toHaveLength(4);
    });
  });
});

describe('checkOutcome', () => {
  const [apt] = PACKAGE_MANAGER_PROFILES;
  const command: Command = { argv: ['apt-get'] };

  it('accepts installed and planned outcomes', () => {
    expect(() => checkOutcome({ status: 'installed', profile: apt, command }, true)).not.toThrow();
    expect(() => checkOutcome({ status: 'planned', profile: apt, command }, true)).not.toThrow();
  });

  it('raises INSTALL_FAILED with the package manager status', () => {
    let thrown: unknown;
    try {
      checkOutcome({ status: 'failed', profile: apt, command, exitCode: 100 }, true);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({
      code: DevstrapErrorCode.INSTALL_FAILED,
      message: 'apt-get exited with status 100',
      context: { profile: 'apt', exitCode: 100 },
    });
  });

  it('raises UNSUPPORTED_PLATFORM only in strict mode', () => {
    expect(() => checkOutcome({ status: 'unsupported', escalator: null }, true)).toThrow('Unsupported Linux distribution');
    expect(() => checkOutcome({ status: 'unsupported', escalator: 'sudo' }, false)).not.toThrow();
  });
});
