import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { readFileSync, existsSync, writeFileSync } from 'fs';
import type { Command } from '../../../src/types/command.js';
import type { ExecResult, Executor } from '../../../src/execution/executor.js';
import type { InteractionFn } from '../../../src/types/run.js';
import type { HardeningConfig } from '../../../src/types/config.js';
import { createProfileDeps } from '../../../src/profiles/index.js';
import { IpForwardCollaborator, hasPersistentLine, ipForwardProfile, procPath } from '../../../src/profiles/ip-forward.js';
import { runProfile } from '../../../src/profiles/run.js';
import { runSucceeded } from '../../../src/reconciler/reconciler.js';
import { testConfig } from '../../fixtures/fakes.js';

const KEY = 'net.ipv4.ip_forward';

/** sysctl stand-in: `--system` loads the conf file into the live value and the /proc file. */
class FakeSysctl implements Executor {
  readonly calls: string[] = [];

  constructor(private readonly config: HardeningConfig['ip_forward'], private readonly procFile: string, public live: string) {
    writeFileSync(procFile, `${live}\n`);
  }

  async execute(command: Command): Promise<ExecResult> {
    const key = command.argv.join(' ');
    this.calls.push(key);
    if (key === `sysctl -n ${KEY}`) return { stdout: `${this.live}\n`, stderr: '', exitCode: 0, durationMs: 0 };
    if (key === 'sysctl --system') {
      if (existsSync(this.config.conf_path)) {
        const match = readFileSync(this.config.conf_path, 'utf-8').match(/^net\.ipv4\.ip_forward=(\S+)$/m);
        if (match?.[1]) {
          this.live = match[1];
          writeFileSync(this.procFile, `${this.live}\n`);
        }
      }
      return { stdout: '', stderr: '', exitCode: 0, durationMs: 0 };
    }
    return { stdout: '', stderr: '', exitCode: 127, durationMs: 0 };
  }
}

const never: InteractionFn = async () => {
  throw new Error('unexpected question');
};

describe('ip-forward helpers', () => {
  it('maps a key to its /proc/sys path', () => {
    expect(procPath(KEY, '/tmp/proc')).toBe('/tmp/proc/net/ipv4/ip_forward');
    expect(procPath(KEY)).toBe('/proc/sys/net/ipv4/ip_forward');
  });

  it('matches only an uncommented exact setting', () => {
    expect(hasPersistentLine('  net.ipv4.ip_forward = 0  \n', KEY, '0')).toBe(true);
    expect(hasPersistentLine('#net.ipv4.ip_forward=0\n', KEY, '0')).toBe(false);
    expect(hasPersistentLine('net.ipv4.ip_forward=01\n', KEY, '0')).toBe(false);
    expect(hasPersistentLine('netXipv4.ip_forward=0\n', KEY, '0')).toBe(false);
  });
});

describe('ip-forward profile', () => {
  let tmpDir: string;
  let config: HardeningConfig;
  let procRoot: string;
  let procFile: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'host-hardening-sysctl-'));
    procRoot = path.join(tmpDir, 'proc');
    procFile = procPath(KEY, procRoot);
    await fs.mkdir(path.dirname(procFile), { recursive: true });
    config = testConfig({ ip_forward: { key: KEY, desired: '0', conf_path: path.join(tmpDir, 'sysctl.d', '99-ipforward.conf') } });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function profileOn(exec: Executor) {
    return ipForwardProfile({ ...createProfileDeps(config, exec), procRoot });
  }

  it('writes the persistent setting, reloads and verifies', async () => {
    const exec = new FakeSysctl(config.ip_forward, procFile, '1');
    const result = await runProfile(profileOn(exec), 'apply-unattended', { purge: false }, never);

    expect(result.actionsApplied).toEqual(['write-persistent', 'reload-sysctl']);
    expect(await fs.readFile(config.ip_forward.conf_path, 'utf-8')).toBe('net.ipv4.ip_forward=0\n');
    expect((await fs.stat(config.ip_forward.conf_path)).mode & 0o777).toBe(0o644);
    expect(exec.live).toBe('0');
    expect(result.satisfiedAfter).toBe(true);
    expect(runSucceeded(result)).toBe(true);
  });

  it('reports the runtime and persistent values separately', async () => {
    const exec = new FakeSysctl(config.ip_forward, procFile, '0');
    const result = await runProfile(profileOn(exec), 'check', { purge: false }, never);
    expect(result.judgementsBefore.map((j) => [j.fact.name, j.verdict])).toEqual([
      ['net.ipv4.ip_forward.live', 'satisfied'],
      ['net.ipv4.ip_forward.proc', 'satisfied'],
      ['net.ipv4.ip_forward.persistent', 'unsatisfied'],
    ]);
  });

  it('asks before each step in interactive mode and changes nothing when declined', async () => {
    const exec = new FakeSysctl(config.ip_forward, procFile, '1');
    const asked: string[] = [];
    const result = await runProfile(profileOn(exec), 'apply', { purge: false }, async (q) => {
      asked.push(q.message);
      expect(q.defaultAnswer).toBe(false);
      return false;
    });
    expect(asked).toEqual([
      `Write net.ipv4.ip_forward=0 to ${config.ip_forward.conf_path}?`,
      'Reload sysctl settings now (sysctl --system)?',
    ]);
    expect(existsSync(config.ip_forward.conf_path)).toBe(false);
    expect(result.errors).toEqual([]);
    expect(runSucceeded(result)).toBe(false);
  });

  it('leaves the /proc fact indeterminate when the file cannot be read', async () => {
    const exec = new FakeSysctl(config.ip_forward, procFile, '0');
    await fs.rm(procFile);
    const c = new IpForwardCollaborator({ ...createProfileDeps(config, exec), procRoot });
    await expect(c.read('net.ipv4.ip_forward.proc')).rejects.toThrow(`Cannot read ${procFile}`);
  });
});
