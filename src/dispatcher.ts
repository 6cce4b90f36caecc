import { formatCommand } from './catalog/types.js';
import type { Catalog, Command, Task } from './catalog/types.js';
import { run, type ExecOptions, type ExecResult } from './shared/exec.js';
import { DispatchError, DispatchErrorCode, EXIT_USAGE } from './shared/errors.js';
import { logger } from './shared/logger.js';

/** Executes one command and reports how it exited. */
export interface CommandRunner {
  run(command: Command): Promise<ExecResult>;
}

/** Runs commands as child processes attached to the current terminal. */
export class ProcessRunner implements CommandRunner {
  constructor(private readonly options: ExecOptions = {}) {}

  run(command: Command): Promise<ExecResult> {
    const [program, ...args] = command.argv;
    return run(program, args, this.options);
  }
}

export interface DispatcherOptions {
  dryRun?: boolean;
  silent?: boolean;                    // no echo of command lines
  echo?: (line: string) => void;       // defaults to stdout
}

export interface TaskResult {
  task: string;
  exitCode: number;
  ran: readonly Command[];              // empty on a dry run
  failedCommand?: Command;
  signal?: string;
  skipped: readonly Command[];
  dryRun: boolean;
}

export class TaskDispatcher {
  private readonly echo: (line: string) => void;

  constructor(
    private readonly catalog: Catalog,
    private readonly runner: CommandRunner = new ProcessRunner(),
    private readonly options: DispatcherOptions = {}
  ) {
    this.echo = options.echo ?? (line => process.stdout.write(line + '\n'));
  }

  listTasks(): Task[] {
    return [...this.catalog.values()];
  }

  resolve(taskName: string): Task {
    const task = this.catalog.get(taskName);
    if (!task) {
      throw new DispatchError(
        DispatchErrorCode.TASK_NOT_FOUND,
        `No rule to make target '${taskName}'`,
        EXIT_USAGE,
        { task: taskName, known: [...this.catalog.keys()] }
      );
    }
    return task;
  }

  /**
   * Runs every command of `taskName` in order and stops at the first non-zero exit.
   * The result's `exitCode` is 0 or the failing command's status. Commands that already
   * ran are not undone.
   */
  async run(taskName: string): Promise<TaskResult> {
    const task = this.resolve(taskName);
    const ran: Command[] = [];
    logger.debug({ task: task.name, commands: task.commands.length }, 'Task started');

    for (const [index, command] of task.commands.entries()) {
      if (!this.options.silent || this.options.dryRun) this.echo(formatCommand(command));
      if (this.options.dryRun) continue;

      let result: ExecResult;
      try {
        result = await this.runner.run(command);
      } catch (err) {
        logger.error(
          { task: task.name, command: command.argv, skipped: task.commands.length - index - 1, err },
          'Task aborted'
        );
        throw err;
      }
      ran.push(command);
      logger.debug({ task: task.name, command: command.argv, ...result }, 'Command finished');

      if (result.exitCode !== 0) {
        const skipped = task.commands.slice(index + 1);
        logger.error(
          { task: task.name, command: command.argv, exitCode: result.exitCode, skipped: skipped.length },
          'Task failed'
        );
        return {
          task: task.name,
          exitCode: result.exitCode,
          ran,
          failedCommand: command,
          signal: result.signal,
          skipped,
          dryRun: false,
        };
      }
    }

    logger.info({ task: task.name, dryRun: !!this.options.dryRun }, 'Task succeeded');
    return { task: task.name, exitCode: 0, ran, skipped: [], dryRun: !!this.options.dryRun };
  }

  /** Like run(), but a failing command becomes a COMMAND_FAILED error carrying its status. */
  async runOrThrow(taskName: string): Promise<TaskResult> {
    const result = await this.run(taskName);
    if (result.failedCommand) {
      const reason = result.signal ? `killed by ${result.signal}` : `Error ${result.exitCode}`;
      throw new DispatchError(
        DispatchErrorCode.COMMAND_FAILED,
        `[${result.task}] ${reason}`,
        result.exitCode,
        {
          task: result.task,
          command: formatCommand(result.failedCommand),
          skipped: result.skipped.map(formatCommand),
        }
      );
    }
    return result;
  }
}
