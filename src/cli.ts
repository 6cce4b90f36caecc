#!/usr/bin/env node
/**
 * taskrun CLI
 * Runs one named task from the catalog and exits with its status.
 */

import { Command, CommanderError } from 'commander';
import { loadCatalog } from './catalog/loader.js';
import { formatCommand } from './catalog/types.js';
import { TaskDispatcher, ProcessRunner, type CommandRunner } from './dispatcher.js';
import { DispatchError, DispatchErrorCode, EXIT_USAGE, isDispatchError } from './shared/errors.js';
import { logger } from './shared/logger.js';

interface CliOptions {
  list?: boolean;
  dryRun?: boolean;
  silent?: boolean;
  config?: string;
}

export interface CliDeps {
  runner?: CommandRunner;
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/** Parses `argv` (without the node and script entries), runs the task and returns the exit status. */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  let exitCode = 0;

  const program = new Command();
  program
    .name('taskrun')
    .description('Run a named task: each of its commands in order, stopping at the first failure')
    .version('0.1.0')
    .argument('[task]', 'task to run')
    .option('-l, --list', 'list tasks and their commands')
    .option('-n, --dry-run', 'print the commands without running them')
    .option('-s, --silent', 'do not echo commands before running them')
    .option('-c, --config <path>', 'load tasks from a YAML catalog file')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr })
    .action(async (taskName: string | undefined, options: CliOptions) => {
      const { catalog } = await loadCatalog({ configPath: options.config, cwd: deps.cwd });
      const dispatcher = new TaskDispatcher(catalog, deps.runner ?? new ProcessRunner({ cwd: deps.cwd }), {
        dryRun: options.dryRun,
        silent: options.silent,
        echo: line => stdout(line + '\n'),
      });

      if (options.list) {
        for (const task of dispatcher.listTasks()) {
          stdout(`${task.name}:\n`);
          for (const command of task.commands) stdout(`\t${formatCommand(command)}\n`);
        }
        return;
      }

      if (taskName === undefined) {
        throw new DispatchError(DispatchErrorCode.USAGE, 'No task given', EXIT_USAGE, {
          known: [...catalog.keys()],
        });
      }

      const result = await dispatcher.runOrThrow(taskName);
      exitCode = result.exitCode;
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version surface as errors with exit code 0 under exitOverride()
      return err.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    if (isDispatchError(err)) {
      // Command failures were already logged by the dispatcher
      if (err.code !== DispatchErrorCode.COMMAND_FAILED && err.code !== DispatchErrorCode.COMMAND_NOT_FOUND) {
        logger.error({ code: err.code, context: err.context }, err.message);
      }
      stderr(`taskrun: *** ${err.message}\n`);
      if (err.code === DispatchErrorCode.TASK_NOT_FOUND || err.code === DispatchErrorCode.USAGE) {
        const known = err.context?.['known'];
        if (Array.isArray(known)) stderr(`taskrun: known tasks: ${known.join(', ')}\n`);
      }
      return err.exitCode;
    }
    throw err;
  }
  return exitCode;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'Unexpected failure');
      process.stderr.write(`taskrun: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  );
}
