import type { Catalog, Command, Task } from './types.js';
import { createCatalog } from './catalog.js';

const cmd = (...argv: [string, ...string[]]): Command => ({ argv });

export const DEFAULT_TASKS: readonly Task[] = [
  {
    name: 'fmt',
    commands: [cmd('prettier', '--write', '.'), cmd('eslint', '.', '--fix')],
  },
  {
    name: 'lint',
    commands: [cmd('eslint', '.')],
  },
  {
    name: 'test',
    commands: [cmd('jest', '--silent')],
  },
];

export const DEFAULT_CATALOG: Catalog = createCatalog(DEFAULT_TASKS);
