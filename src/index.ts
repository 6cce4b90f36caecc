export { TaskDispatcher, ProcessRunner } from './dispatcher.js';
export type { CommandRunner, DispatcherOptions, TaskResult } from './dispatcher.js';
export { createCatalog } from './catalog/catalog.js';
export { DEFAULT_CATALOG, DEFAULT_TASKS } from './catalog/defaults.js';
export { loadCatalog, parseCatalog, DEFAULT_CATALOG_FILE } from './catalog/loader.js';
export type { CatalogResult } from './catalog/loader.js';
export { formatCommand } from './catalog/types.js';
export type { Catalog, Command, Task } from './catalog/types.js';
export { run, signalExitCode } from './shared/exec.js';
export type { ExecOptions, ExecResult } from './shared/exec.js';
export { DispatchError, DispatchErrorCode, EXIT_USAGE, EXIT_COMMAND_NOT_FOUND, isDispatchError } from './shared/errors.js';
export { main } from './cli.js';
