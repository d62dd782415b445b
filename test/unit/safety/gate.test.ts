import { ActionGate } from '../../../src/safety/gate.js';
import type { Question } from '../../../src/types/run.js';
import { action } from '../../fixtures/fakes.js';

describe('ActionGate', () => {
  const yes = async () => true;

  it('never proceeds in check mode', async () => {
    expect(await new ActionGate('check', yes).check(action('a', []))).toEqual({ proceed: false, reason: 'not-authorized' });
  });

  it('runs plain actions without asking', async () => {
    const interact = jest.fn(yes);
    expect(await new ActionGate('apply', interact).check(action('a', []))).toEqual({ proceed: true });
    expect(interact).not.toHaveBeenCalled();
  });

  it('asks about confirm actions only in interactive apply', async () => {
    const interact = jest.fn(async (_q: Question) => false);
    const confirmAction = action('reload', [], { confirm: true });
    expect(await new ActionGate('apply', interact).check(confirmAction)).toEqual({ proceed: false, reason: 'declined' });
    expect(interact).toHaveBeenCalledWith({ kind: 'confirm-action', message: 'do reload?', defaultAnswer: true, action: 'reload' });

    expect(await new ActionGate('apply-unattended', interact).check(confirmAction)).toEqual({ proceed: true });
    expect(await new ActionGate('backout', interact).check(confirmAction)).toEqual({ proceed: true });
    expect(interact).toHaveBeenCalledTimes(1);
  });

  it('requires pre-authorization for destructive actions outside interactive apply', async () => {
    const purge = action('purge', [], { destructive: true });
    expect(await new ActionGate('backout', yes).check(purge)).toEqual({ proceed: false, reason: 'not-authorized' });
    expect(await new ActionGate('apply-unattended', yes).check({ ...purge, preAuthorized: true })).toEqual({ proceed: true });
  });

  it('asks for destructive actions in apply with the declared default', async () => {
    const interact = jest.fn(async (_q: Question) => true);
    await new ActionGate('apply', interact).check(action('purge', [], { destructive: true, promptDefault: true, prompt: 'Purge?' }));
    expect(interact).toHaveBeenCalledWith({ kind: 'confirm-action', message: 'Purge?', defaultAnswer: true, action: 'purge' });
  });

  it('reuses one answer for actions that share a prompt', async () => {
    const interact = jest.fn(async (_q: Question) => true);
    const gate = new ActionGate('apply', interact);
    const shared = { confirm: true, prompt: 'Disable and mask the units now?' };
    expect(await gate.check(action('disable u', [], shared))).toEqual({ proceed: true });
    expect(await gate.check(action('mask u', [], shared))).toEqual({ proceed: true });
    expect(await gate.check(action('reload', [], { confirm: true }))).toEqual({ proceed: true });
    expect(interact).toHaveBeenCalledTimes(2);
  });
});
