import type { Command } from '../../../src/types/command.js';
import type { ExecResult, Executor } from '../../../src/execution/executor.js';
import type { InteractionFn } from '../../../src/types/run.js';
import type { FactValue } from '../../../src/types/fact.js';
import { createProfileDeps } from '../../../src/profiles/index.js';
import {
  PACKAGE_FACT, PORT_FACT, RpcbindCollaborator, buildRpcbindActions, buildRpcbindTarget, rpcbindProfile, unitFact,
} from '../../../src/profiles/rpcbind.js';
import { runProfile } from '../../../src/profiles/run.js';
import { runSucceeded } from '../../../src/reconciler/reconciler.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { testConfig } from '../../fixtures/fakes.js';

interface UnitState {
  active: boolean;
  enabled: boolean;
  masked: boolean;
}

/** Just enough systemd, dpkg, apt and ss behaviour to drive the rpcbind profile. */
class FakeHost implements Executor {
  readonly calls: string[] = [];
  readonly units = new Map<string, UnitState>();
  installed = true;
  aptAvailable = true;
  ssAvailable = true;

  constructor() {
    this.installPackage();
  }

  /** Masks are symlinks in /etc/systemd/system and survive a purge and a reinstall. */
  private installPackage(): void {
    this.installed = true;
    for (const name of ['rpcbind.socket', 'rpcbind.service']) {
      const masked = this.units.get(name)?.masked ?? false;
      this.units.set(name, { active: !masked, enabled: !masked, masked });
    }
  }

  private get listening(): boolean {
    return [...this.units.values()].some((u) => u.active);
  }

  async execute(command: Command): Promise<ExecResult> {
    const key = command.argv.join(' ');
    this.calls.push(key);
    const ok = (stdout = ''): ExecResult => ({ stdout, stderr: '', exitCode: 0, durationMs: 0 });
    const fail = (exitCode: number, stdout = '', stderr = ''): ExecResult => ({ stdout, stderr, exitCode, durationMs: 0 });
    const [tool, verb, ...rest] = command.argv;
    const unitName = rest[rest.length - 1] ?? '';
    const unit = this.units.get(unitName);

    switch (tool) {
      case 'ss':
        if (!this.ssAvailable) return fail(127);
        return ok('Netid State  Local Address:Port  Peer Address:Port\n' + (this.listening ? 'tcp   LISTEN 0.0.0.0:111  0.0.0.0:*  users:(("rpcbind",pid=1,fd=4))\n' : ''));
      case 'dpkg-query':
        return this.installed ? ok('install ok installed') : fail(1, '', 'dpkg-query: no packages found matching rpcbind');
      case 'apt-get':
        if (!this.aptAvailable) return fail(127);
        if (verb === 'purge') {
          this.installed = false;
          for (const [name, u] of this.units) {
            if (u.masked) u.active = u.enabled = false;
            else this.units.delete(name);
          }
        } else {
          this.installPackage();
          for (const u of this.units.values()) u.active = u.enabled = false;
        }
        return ok();
      case 'systemctl':
        break;
      default:
        return fail(127);
    }

    if (verb === 'list-unit-files') {
      return ok([...this.units.entries()].map(([name, u]) => `${name}  ${u.masked ? 'masked' : u.enabled ? 'enabled' : 'disabled'}  enabled`).join('\n'));
    }
    if (!unit) return fail(1, '', `Unit ${unitName} not found.`);
    switch (verb) {
      case 'is-active':
        return unit.active ? ok('active\n') : fail(3, 'inactive\n');
      case 'is-enabled':
        return unit.masked ? fail(1, 'masked\n') : unit.enabled ? ok('enabled\n') : fail(1, 'disabled\n');
      case 'disable':
        unit.enabled = false;
        if (rest.includes('--now')) unit.active = false;
        return ok();
      case 'enable':
        unit.enabled = true;
        if (rest.includes('--now')) unit.active = true;
        return ok();
      case 'mask':
        unit.masked = true;
        return ok();
      case 'unmask':
        unit.masked = false;
        return ok();
      default:
        return fail(1);
    }
  }
}

const never: InteractionFn = async () => {
  throw new Error('unexpected question');
};

function profileOn(host: FakeHost) {
  return rpcbindProfile(createProfileDeps(testConfig(), host));
}

describe('rpcbind targets', () => {
  it('declares port, per-unit and optional package facts', () => {
    expect(buildRpcbindTarget(DEFAULT_CONFIG.rpcbind, { purge: false }).facts.map((f) => f.name)).toEqual([
      PORT_FACT,
      'rpcbind.socket.active', 'rpcbind.socket.masked',
      'rpcbind.service.active', 'rpcbind.service.masked',
    ]);
    expect(buildRpcbindTarget(DEFAULT_CONFIG.rpcbind, { purge: true }).facts.map((f) => f.name)).toContain(PACKAGE_FACT);
  });

  it('orders disable before mask for each unit and purge last', () => {
    expect(buildRpcbindActions(DEFAULT_CONFIG.rpcbind, { purge: false }).map((a) => a.name)).toEqual([
      'disable rpcbind.socket', 'mask rpcbind.socket', 'disable rpcbind.service', 'mask rpcbind.service', 'purge rpcbind',
    ]);
  });
});

describe('RpcbindCollaborator', () => {
  function listening(stdout: string): Promise<FactValue> {
    return new RpcbindCollaborator(createProfileDeps(testConfig(), {
      execute: async () => ({ stdout, stderr: '', exitCode: 0, durationMs: 0 }),
    })).read(PORT_FACT);
  }

  it('detects the portmapper listener on IPv4 and IPv6', async () => {
    expect(await listening('udp UNCONN 0 0 0.0.0.0:111 0.0.0.0:*\n')).toBe(true);
    expect(await listening('tcp LISTEN 0 4096 127.0.0.1:111 0.0.0.0:*\n')).toBe(true);
    expect(await listening('tcp LISTEN 0 4096 [::]:111 [::]:*\n')).toBe(true);
    expect(await listening('tcp LISTEN 0 4096 *:111 *:*\n')).toBe(true);
  });

  it('ignores ports that only share digits with the portmapper port', async () => {
    expect(await listening('tcp LISTEN 0 128 0.0.0.0:1111 0.0.0.0:*\n')).toBe(false);
    expect(await listening('tcp LISTEN 0 128 0.0.0.0:1110 0.0.0.0:*\n')).toBe(false);
    expect(await listening('Netid State Recv-Q Send-Q Local Address:Port Peer Address:Port\n')).toBe(false);
  });

  it('treats an absent unit as inactive and masked', async () => {
    const host = new FakeHost();
    host.units.clear();
    const c = new RpcbindCollaborator(createProfileDeps(testConfig(), host));
    expect(await c.read(unitFact('rpcbind.socket', 'active'))).toBe(false);
    expect(await c.read(unitFact('rpcbind.socket', 'masked'))).toBe(true);
  });

  it('reads the package state from dpkg-query', async () => {
    const host = new FakeHost();
    const c = new RpcbindCollaborator(createProfileDeps(testConfig(), host));
    expect(await c.read(PACKAGE_FACT)).toBe(true);
    host.installed = false;
    expect(await c.read(PACKAGE_FACT)).toBe(false);
  });

  it('rejects unknown facts', async () => {
    const c = new RpcbindCollaborator(createProfileDeps(testConfig(), new FakeHost()));
    await expect(c.read('rpcbind.bogus')).rejects.toThrow("Unknown rpcbind fact 'rpcbind.bogus'");
  });
});

describe('rpcbind profile', () => {
  it('disables and masks both units without purging by default', async () => {
    const host = new FakeHost();
    const result = await runProfile(profileOn(host), 'apply-unattended', { purge: false }, never);
    expect(result.actionsApplied).toEqual([
      'disable rpcbind.socket', 'mask rpcbind.socket', 'disable rpcbind.service', 'mask rpcbind.service',
    ]);
    expect(result.actionsSkipped).toEqual([{ action: 'purge rpcbind', reason: 'not-authorized' }]);
    expect(host.calls).toContain('systemctl disable --now rpcbind.socket');
    expect(host.installed).toBe(true);
    expect(result.satisfiedAfter).toBe(true);
    expect(runSucceeded(result)).toBe(true);
  });

  it('sees the listener before hardening and not after', async () => {
    const host = new FakeHost();
    const result = await runProfile(profileOn(host), 'apply-unattended', { purge: false }, never);
    expect(result.judgementsBefore[0]).toMatchObject({ observation: { status: 'known', value: true }, verdict: 'unsatisfied' });
    expect(result.judgementsAfter[0]).toMatchObject({ observation: { status: 'known', value: false }, verdict: 'satisfied' });
  });

  it('asks once before disabling and masking and changes nothing when declined', async () => {
    const host = new FakeHost();
    const questions: Array<[string, boolean]> = [];
    const result = await runProfile(profileOn(host), 'apply', { purge: false }, async (q) => {
      questions.push([q.message, q.defaultAnswer]);
      return false;
    });
    expect(questions).toEqual([
      ['Disable and mask rpcbind.socket and rpcbind.service now?', true],
      ['Purge the rpcbind package via apt-get now?', false],
    ]);
    expect(host.calls.filter((c) => /systemctl (disable|mask)|apt-get/.test(c))).toEqual([]);
    expect(result.actionsApplied).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it('does not offer the purge or report no-op writes on a host without rpcbind', async () => {
    const host = new FakeHost();
    host.installed = false;
    host.units.clear();
    const asked: string[] = [];
    const result = await runProfile(profileOn(host), 'apply', { purge: false }, async (q) => {
      asked.push(q.message);
      return true;
    });
    expect(asked).toEqual([
      'rpcbind disabled already matches the desired state. Reapply anyway?',
      'Disable and mask rpcbind.socket and rpcbind.service now?',
    ]);
    expect(result.actionsApplied).toEqual([]);
    expect(result.actionsSkipped).toContainEqual({ action: 'purge rpcbind', reason: 'not-applicable' });
    expect(result.actionsSkipped).toContainEqual({ action: 'mask rpcbind.socket', reason: 'unchanged' });
    expect(host.calls.filter((c) => c.startsWith('apt-get'))).toEqual([]);
  });

  it('is a no-op on an already hardened host', async () => {
    const host = new FakeHost();
    await runProfile(profileOn(host), 'apply-unattended', { purge: false }, never);
    host.calls.length = 0;

    const second = await runProfile(profileOn(host), 'apply-unattended', { purge: false }, never);
    expect(second.satisfiedBefore).toBe(true);
    expect(second.actionsApplied).toEqual([]);
    expect(host.calls.filter((c) => /systemctl (disable|mask)|apt-get/.test(c))).toEqual([]);
  });

  it('purges the package when pre-authorized', async () => {
    const host = new FakeHost();
    const result = await runProfile(profileOn(host), 'apply-unattended', { purge: true }, never);
    expect(result.actionsApplied).toContain('purge rpcbind');
    expect(host.calls).toContain('apt-get purge -y rpcbind');
    expect(host.installed).toBe(false);
    expect(runSucceeded(result)).toBe(true);
  });

  it('backs out to an installed, enabled socket and can repeat', async () => {
    const host = new FakeHost();
    await runProfile(profileOn(host), 'apply-unattended', { purge: true }, never);

    const first = await runProfile(profileOn(host), 'backout', { purge: false }, never);
    expect(first.target).toBe('rpcbind restored');
    expect(first.actionsApplied).toEqual([
      'install rpcbind', 'unmask rpcbind.socket', 'unmask rpcbind.service', 'enable --now rpcbind.socket', 'enable rpcbind.service',
    ]);
    expect(host.calls).toContain('apt-get install -y rpcbind');
    expect(runSucceeded(first)).toBe(true);

    const second = await runProfile(profileOn(host), 'backout', { purge: false }, never);
    expect(second.errors).toEqual([]);
    expect(runSucceeded(second)).toBe(true);
  });

  it('aborts backout when apt-get is missing', async () => {
    const host = new FakeHost();
    await runProfile(profileOn(host), 'apply-unattended', { purge: true }, never);
    host.aptAvailable = false;

    const result = await runProfile(profileOn(host), 'backout', { purge: false }, never);
    expect(result.aborted).toBe(true);
    expect(result.satisfiedAfter).toBeNull();
    expect(result.errors[0]).toMatchObject({ kind: 'prerequisite', source: { type: 'action', name: 'install rpcbind' } });
  });

  it('leaves the port fact indeterminate without ss but judges the rest', async () => {
    const host = new FakeHost();
    host.ssAvailable = false;
    const result = await runProfile(profileOn(host), 'check', { purge: false }, never);
    expect(result.judgementsBefore[0]?.verdict).toBe('indeterminate');
    expect(result.verdictBefore).toBe('unsatisfied');
    expect(result.errors).toEqual([
      { kind: 'observation', source: { type: 'fact', name: PORT_FACT }, message: 'ss is not available', fatal: false },
    ]);
  });
});
