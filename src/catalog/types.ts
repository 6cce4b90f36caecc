/**
 * A single external program invocation. `argv[0]` is the program, the rest its arguments.
 * Commands never go through a shell, so arguments are passed to the program verbatim.
 */
export interface Command {
  readonly argv: readonly [string, ...string[]];
}

export interface Task {
  readonly name: string;
  readonly commands: readonly Command[];   // run in order, never empty
}

/** Task name → task. Built once at startup and frozen. */
export type Catalog = ReadonlyMap<string, Task>;

export function formatCommand(command: Command): string {
  return command.argv.join(' ');
}
