import { DispatchError, DispatchErrorCode, EXIT_USAGE } from '../shared/errors.js';
import type { Catalog, Command, Task } from './types.js';

class FrozenCatalog extends Map<string, Task> {
  private sealed = false;

  seal(): this {
    this.sealed = true;
    return this;
  }

  override set(key: string, value: Task): this {
    if (this.sealed) throw new TypeError('Catalog is read-only');
    return super.set(key, value);
  }

  override delete(key: string): boolean {
    if (this.sealed) throw new TypeError('Catalog is read-only');
    return super.delete(key);
  }

  override clear(): void {
    if (this.sealed) throw new TypeError('Catalog is read-only');
    super.clear();
  }
}

/**
 * Builds an immutable catalog from a task list. Task and command objects are
 * copied and frozen so later changes to `tasks` cannot reach the catalog.
 */
export function createCatalog(tasks: readonly Task[]): Catalog {
  const catalog = new FrozenCatalog();
  for (const task of tasks) {
    if (catalog.has(task.name)) {
      throw new DispatchError(
        DispatchErrorCode.INVALID_CATALOG,
        `Duplicate task name: ${task.name}`,
        EXIT_USAGE,
        { task: task.name }
      );
    }
    if (task.commands.length === 0) {
      throw new DispatchError(
        DispatchErrorCode.INVALID_CATALOG,
        `Task "${task.name}" has no commands`,
        EXIT_USAGE,
        { task: task.name }
      );
    }
    const commands = Object.freeze(task.commands.map(freezeCommand));
    catalog.set(task.name, Object.freeze({ name: task.name, commands }));
  }
  return catalog.seal();
}

function freezeCommand(command: Command): Command {
  const [program, ...args] = command.argv;
  return Object.freeze({ argv: Object.freeze<[string, ...string[]]>([program, ...args]) });
}
