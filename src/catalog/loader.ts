// Catalog loader: reads taskrun.yaml (or an explicit --config path) once at startup.
// No file at the default location means the built-in catalog; an explicit path that
// does not exist is an error. Whatever is loaded is validated in full before any task runs.
import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DispatchError, DispatchErrorCode, EXIT_USAGE } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createCatalog } from './catalog.js';
import { DEFAULT_CATALOG } from './defaults.js';
import type { Catalog, Command, Task } from './types.js';

export const DEFAULT_CATALOG_FILE = 'taskrun.yaml';

const TASK_NAME = /^[A-Za-z0-9][A-Za-z0-9_.:-]*$/;

// A command is either an argv list or a plain string split on whitespace (no quoting).
const commandSchema = z
  .union([z.array(z.string()), z.string()])
  .transform(value => (typeof value === 'string' ? value.trim().split(/\s+/) : value))
  .refine((argv): argv is [string, ...string[]] => argv.length > 0 && argv[0] !== '', {
    message: 'command must name a program',
  });

const catalogFileSchema = z.object({
  tasks: z.record(
    z.string().regex(TASK_NAME, 'task names must be alphanumeric (plus _ . : -)'),
    z.array(commandSchema).min(1, 'a task needs at least one command')
  ),
});

export interface CatalogResult {
  catalog: Catalog;
  source: string | null;   // file the catalog came from, null for the built-in one
}

export function parseCatalog(yamlText: string, source = '<inline>'): Catalog {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (e) {
    throw invalid(source, `Invalid YAML: ${(e as Error).message}`);
  }

  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw invalid(source, `${where}${issue?.message ?? 'invalid catalog'}`, {
      issues: parsed.error.issues,
    });
  }

  const tasks: Task[] = Object.entries(parsed.data.tasks).map(([name, argvs]) => ({
    name,
    commands: argvs.map((argv): Command => ({ argv })),
  }));
  return createCatalog(tasks);
}

export async function loadCatalog(options: { configPath?: string; cwd?: string } = {}): Promise<CatalogResult> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const filePath = path.resolve(cwd, options.configPath ?? DEFAULT_CATALOG_FILE);

  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT' && !explicit) {
      logger.debug({ filePath }, 'No catalog file, using built-in tasks');
      return { catalog: DEFAULT_CATALOG, source: null };
    }
    throw invalid(filePath, `Cannot read catalog file: ${(err as Error).message}`);
  }

  const catalog = parseCatalog(text, filePath);
  logger.debug({ filePath, tasks: [...catalog.keys()] }, 'Loaded catalog');
  return { catalog, source: filePath };
}

function invalid(source: string, detail: string, context?: Record<string, unknown>): DispatchError {
  return new DispatchError(
    DispatchErrorCode.INVALID_CATALOG,
    `${source}: ${detail}`,
    EXIT_USAGE,
    { source, ...context }
  );
}
