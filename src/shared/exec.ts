import os from 'os';
import execa from 'execa';
import { DispatchError, DispatchErrorCode, EXIT_COMMAND_NOT_FOUND } from './errors.js';

export interface ExecResult {
  exitCode: number;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs `command` with the parent's stdio attached and resolves with its exit status.
 *
 * A non-zero exit is a result, not an error. A child killed by a signal resolves with
 * `128 + signo`, the status a POSIX shell reports. Only a program that cannot be
 * spawned at all rejects, with COMMAND_NOT_FOUND.
 */
export async function run(
  command: string,
  args: readonly string[],
  options?: ExecOptions
): Promise<ExecResult> {
  let result: execa.ExecaReturnValue;
  try {
    result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      stdio: 'inherit',
      preferLocal: true,
      reject: false,
    });
  } catch (err) {
    throw new DispatchError(
      DispatchErrorCode.COMMAND_NOT_FOUND,
      `Command failed to spawn: ${command}`,
      EXIT_COMMAND_NOT_FOUND,
      { cause: err instanceof Error ? err.message : String(err) }
    );
  }

  if (result.signal) {
    return { exitCode: signalExitCode(result.signal), signal: result.signal };
  }
  // With reject: false, spawn errors such as ENOENT resolve as a failed result without an exit code.
  if (result.failed && !Number.isInteger(result.exitCode)) {
    throw new DispatchError(
      DispatchErrorCode.COMMAND_NOT_FOUND,
      `Command failed to spawn: ${command}`,
      EXIT_COMMAND_NOT_FOUND,
      { cause: result instanceof Error ? result.message : result.command }
    );
  }
  return { exitCode: result.exitCode };
}

export function signalExitCode(signal: string): number {
  const signo: unknown = Reflect.get(os.constants.signals, signal);
  return 128 + (typeof signo === 'number' ? signo : 1);
}
