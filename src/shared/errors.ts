export enum DispatchErrorCode {
  TASK_NOT_FOUND = 'TASK_NOT_FOUND',
  COMMAND_FAILED = 'COMMAND_FAILED',
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  INVALID_CATALOG = 'INVALID_CATALOG',
  USAGE = 'USAGE',
}

// Exit statuses for errors that do not come from a child process.
// 2 is what make(1) uses for its own errors; 127 is the shell's "command not found".
export const EXIT_USAGE = 2;
export const EXIT_COMMAND_NOT_FOUND = 127;

export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(
    code: DispatchErrorCode,
    message: string,
    exitCode: number,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;
  }
}

export function isDispatchError(err: unknown): err is DispatchError {
  return err instanceof DispatchError;
}
