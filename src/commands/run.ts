import { resolve } from 'node:path';

import { loadJobConfig } from '../core/job-config.js';
import type { JobConfig } from '../core/job-config.js';
import { describeCell } from '../core/matrix.js';
import { exitCodeFor, runJob } from '../core/job-runner.js';
import type { RunHooks, RunResult } from '../core/job-runner.js';
import { ShellExecutor } from '../core/executor.js';
import type { CommandExecutor } from '../core/executor.js';
import { WorkspaceProvider } from '../core/environment.js';
import type { EnvironmentProvider } from '../core/environment.js';
import { DEFAULT_EVENT, isTriggeredBy, normalizeEvent } from '../core/triggers.js';
import { buildPlan, printPlan } from './plan.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { formatStepLine, printSummary } from '../ui/summary.js';
import { ConfigError } from '../utils/errors.js';
import { writeJsonFile } from '../utils/fs.js';

export interface RunOptions {
  file?: string;
  event?: string;
  concurrency?: string;
  timeoutMinutes?: string;
  cwd?: string;
  workdir?: string;
  keepWorkspaces?: boolean;
  json?: string;
  dryRun?: boolean;
}

/** Collaborators the command builds for itself unless given. */
export interface RunDependencies {
  executor?: CommandExecutor;
  environments?: EnvironmentProvider;
  signal?: AbortSignal;
}

export interface RunSettings {
  event: string;
  concurrency: number;
  timeoutMs?: number;
}


function parsePositive(label: string, value: string, integer: boolean): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0 || (integer && !Number.isInteger(n))) {
    throw new ConfigError(`${label} must be a positive ${integer ? 'integer' : 'number'}, got "${value}"`);
  }
  return n;
}

/** CLI flags win over the job file, which wins over the environment. */
export function resolveRunSettings(
  options: RunOptions,
  job: JobConfig,
  env: Record<string, string | undefined> = process.env,
): RunSettings {
  let concurrency = 1;
  if (options.concurrency !== undefined) {
    concurrency = parsePositive('--concurrency', options.concurrency, true);
  } else if (job.concurrency !== undefined) {
    concurrency = job.concurrency;
  } else if (env.MATRIXRUN_CONCURRENCY) {
    concurrency = parsePositive('MATRIXRUN_CONCURRENCY', env.MATRIXRUN_CONCURRENCY, true);
  }

  const settings: RunSettings = {
    event: normalizeEvent(options.event ?? DEFAULT_EVENT),
    concurrency,
  };

  if (options.timeoutMinutes !== undefined) {
    settings.timeoutMs = Math.round(parsePositive('--timeout-minutes', options.timeoutMinutes, false) * 60_000);
  } else if (job.timeoutMs !== undefined) {
    settings.timeoutMs = job.timeoutMs;
  }

  return settings;
}

function progressHooks(): RunHooks {
  return {
    onCellStart(cell) {
      logger.info(`Starting cell ${describeCell(cell)}`);
    },
    onStepFinish(cell, step) {
      const line = formatStepLine(cell.id, step);
      if (step.status === 'success') logger.success(line);
      else if (step.status === 'failure') logger.error(line);
      else logger.skipped(line);
    },
  };
}

/**
 * Runs the job file and returns the process exit status: 0 when every
 * cell passed or the event does not trigger the job, 1 otherwise.
 * ConfigError propagates to the caller before any cell starts.
 */
export async function runCommand(options: RunOptions, deps: RunDependencies = {}): Promise<number> {
  const job = await withSpinner('Loading job file...', () => loadJobConfig(options.file));
  const settings = resolveRunSettings(options, job);

  if (!isTriggeredBy(job.triggers, settings.event)) {
    logger.info(`Job "${job.name}" is not triggered by ${settings.event} (triggers: ${job.triggers.join(', ')}).`);
    return 0;
  }

  const cells = buildPlan(job);

  if (options.dryRun) {
    printPlan(job, cells);
    return 0;
  }

  logger.header(`${job.name} (${settings.event}): ${cells.length} cell${cells.length === 1 ? '' : 's'}`);

  const environments =
    deps.environments ??
    new WorkspaceProvider({
      sourceDir: resolve(options.cwd ?? process.cwd()),
      workdir: options.workdir,
      keep: options.keepWorkspaces ?? false,
      env: job.env,
    });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted; stopping after running steps exit.');
    controller.abort();
  };
  const onParentAbort = () => controller.abort();
  if (deps.signal?.aborted) controller.abort();
  deps.signal?.addEventListener('abort', onParentAbort, { once: true });
  process.once('SIGINT', onInterrupt);

  let result: RunResult;
  try {
    result = await runJob(cells, job.steps, {
      executor: deps.executor ?? new ShellExecutor(),
      environments,
      concurrency: settings.concurrency,
      timeoutMs: settings.timeoutMs,
      signal: controller.signal,
      hooks: progressHooks(),
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    deps.signal?.removeEventListener('abort', onParentAbort);
  }

  printSummary(result, job.name);

  if (options.json) {
    await writeJsonFile(resolve(options.json), { job: job.name, event: settings.event, ...result });
    logger.dim(`Result written to ${options.json}`);
  }

  return exitCodeFor(result);
}
