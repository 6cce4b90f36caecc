import fs from 'fs';
import os from 'os';
import { run, signalExitCode } from '../../../src/shared/exec.js';
import { DispatchErrorCode } from '../../../src/shared/errors.js';

// Real child processes, but only the running node binary — nothing outside this machine's PATH.
const node = process.execPath;

describe('run', () => {
  it('resolves with exit code 0 for a successful command', async () => {
    const result = await run(node, ['-e', 'process.exit(0)']);
    expect(result).toEqual({ exitCode: 0 });
  });

  it('resolves (does not reject) with the non-zero exit code', async () => {
    const result = await run(node, ['-e', 'process.exit(3)']);
    expect(result.exitCode).toBe(3);
  });

  it('inherits the working directory given in options', async () => {
    const dir = fs.realpathSync(os.tmpdir());
    const script = `process.exit(process.cwd() === ${JSON.stringify(dir)} ? 0 : 9)`;
    const result = await run(node, ['-e', script], { cwd: dir });
    expect(result.exitCode).toBe(0);
  });

  it('reports a signal death as 128 + signal number', async () => {
    const result = await run(node, ['-e', 'process.kill(process.pid, "SIGTERM")']);
    expect(result.signal).toBe('SIGTERM');
    expect(result.exitCode).toBe(143);
  });

  it('rejects with COMMAND_NOT_FOUND when the program does not exist', async () => {
    await expect(run('taskrun-no-such-program-xyz', [])).rejects.toMatchObject({
      code: DispatchErrorCode.COMMAND_NOT_FOUND,
      exitCode: 127,
    });
  });
});

describe('signalExitCode', () => {
  it('maps known signals the way a shell does', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGKILL')).toBe(137);
  });

  it('falls back to 129 for an unknown signal name', () => {
    expect(signalExitCode('SIGNOTREAL')).toBe(129);
  });
});
