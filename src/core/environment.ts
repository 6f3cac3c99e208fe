import { cp, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join, resolve } from 'node:path';

import type { Cell } from './matrix.js';
import type { ExecutionEnvironment } from './executor.js';
import { WorkspaceError, errorMessage } from '../utils/errors.js';
import { logger } from '../ui/logger.js';

export interface CellEnvironment extends ExecutionEnvironment {
  readonly cell: Cell;
  /** Removes whatever acquire() created. Safe to call more than once. */
  release(): Promise<void>;
}

export interface EnvironmentProvider {
  acquire(cell: Cell): Promise<CellEnvironment>;
}

export interface WorkspaceProviderOptions {
  /**
   * Parent directory for cell workspaces. Defaults to the OS temp dir.
   * Must not lie inside sourceDir when copySource is on.
   */
  workdir?: string;
  /** Directory copied into each workspace when copySource is on. */
  sourceDir?: string;
  copySource?: boolean;
  /** Leave workspaces on disk after the cell finishes. */
  keep?: boolean;
  /** Variables every cell inherits. Defaults to process.env. */
  baseEnv?: Record<string, string | undefined>;
  /** Job-level variables layered over baseEnv. */
  env?: Record<string, string>;
}

const SKIPPED_SOURCE_ENTRIES = new Set(['node_modules', '.git']);

/**
 * "python-version" → "MATRIX_PYTHON_VERSION"
 */
export function matrixEnvName(axis: string): string {
  return `MATRIX_${axis.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

export function cellEnvVars(cell: Cell): Record<string, string> {
  const vars: Record<string, string> = { MATRIXRUN_CELL: cell.id };
  for (const [axis, value] of Object.entries(cell.bindings)) {
    vars[matrixEnvName(axis)] = value;
  }
  return vars;
}

function slugifyCell(cell: Cell): string {
  const slug = cell.id
    .toLowerCase()
    .replace(/[^a-z0-9.]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 40);
  return `${cell.index}-${slug || 'cell'}`;
}

function definedEntries(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Gives every cell a fresh directory (optionally seeded with a copy of the
 * source tree) so installs and caches written by one cell never reach another.
 */
export class WorkspaceProvider implements EnvironmentProvider {
  private readonly options: WorkspaceProviderOptions;

  constructor(options: WorkspaceProviderOptions = {}) {
    this.options = options;
  }

  async acquire(cell: Cell): Promise<CellEnvironment> {
    const workdir = resolve(this.options.workdir ?? tmpdir());
    let dir: string;
    try {
      dir = await mkdtemp(join(workdir, `matrixrun-${slugifyCell(cell)}-`));
    } catch (error) {
      throw new WorkspaceError(`Could not create workspace for cell ${cell.id}: ${errorMessage(error)}`);
    }

    if (this.options.copySource ?? true) {
      const sourceDir = resolve(this.options.sourceDir ?? process.cwd());
      try {
        await cp(sourceDir, dir, {
          recursive: true,
          filter: (src) => resolve(src) === sourceDir || !SKIPPED_SOURCE_ENTRIES.has(basename(src)),
        });
      } catch (error) {
        await rm(dir, { recursive: true, force: true });
        throw new WorkspaceError(`Could not copy ${sourceDir} into workspace for cell ${cell.id}: ${errorMessage(error)}`);
      }
    }

    logger.debug(`Workspace for cell ${cell.id}: ${dir}`);

    const env = {
      ...definedEntries(this.options.baseEnv ?? process.env),
      ...this.options.env,
      ...cellEnvVars(cell),
      MATRIXRUN_WORKSPACE: dir,
    };

    const keep = this.options.keep ?? false;
    let released = false;

    return {
      cell,
      cwd: dir,
      env,
      async release() {
        if (released || keep) return;
        released = true;
        await rm(dir, { recursive: true, force: true });
      },
    };
  }
}
