import { DispatchError, DispatchErrorCode, isDispatchError } from '../../../src/shared/errors.js';

describe('DispatchError', () => {
  it('creates error with code, message and exit status', () => {
    const err = new DispatchError(DispatchErrorCode.TASK_NOT_FOUND, "No rule to make target 'build'", 2);
    expect(err.code).toBe(DispatchErrorCode.TASK_NOT_FOUND);
    expect(err.message).toBe("No rule to make target 'build'");
    expect(err.exitCode).toBe(2);
    expect(err.name).toBe('DispatchError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new DispatchError(DispatchErrorCode.COMMAND_FAILED, '[lint] Error 1', 1, { task: 'lint' });
    expect(err.context).toEqual({ task: 'lint' });
  });

  it('isDispatchError distinguishes plain errors', () => {
    expect(isDispatchError(new DispatchError(DispatchErrorCode.USAGE, 'x', 2))).toBe(true);
    expect(isDispatchError(new Error('x'))).toBe(false);
    expect(isDispatchError('x')).toBe(false);
  });
});
