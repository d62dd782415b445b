import { COMMAND_NOT_FOUND, LocalExecutor, formatCommand, timeoutFor } from '../../../src/execution/executor.js';

describe('LocalExecutor', () => {
  it('maps a missing binary to exit code 127', async () => {
    const r = await new LocalExecutor().execute({ argv: ['host-hardening-no-such-binary', '--version'] }, 5000);
    expect(r.exitCode).toBe(COMMAND_NOT_FOUND);
  });

  it('rejects an empty command', async () => {
    await expect(new LocalExecutor().execute({ argv: [] }, 5000)).rejects.toThrow('Cannot execute an empty command');
  });
});

describe('timeoutFor', () => {
  it('uses the category default without a ceiling', () => {
    expect(timeoutFor('quick', 0)).toBe(15_000);
  });

  it('never exceeds the ceiling', () => {
    expect(timeoutFor('normal', 5)).toBe(5_000);
    expect(timeoutFor('instant', 60)).toBe(5_000);
  });
});

describe('formatCommand', () => {
  it('joins argv', () => {
    expect(formatCommand({ argv: ['systemctl', 'mask', 'rpcbind.socket'] })).toBe('systemctl mask rpcbind.socket');
  });
});
