import type { Cell } from './matrix.js';
import type { CommandExecutor, ExecResult } from './executor.js';
import type { CellEnvironment, EnvironmentProvider } from './environment.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { matrixReferences, renderEnv, renderTemplate } from '../utils/template.js';
import { logger } from '../ui/logger.js';

export interface StepDefinition {
  name: string;
  /** Shell command; may reference `${{ matrix.<axis> }}`. */
  run: string;
  env?: Record<string, string>;
  /** Overrides the run-wide step timeout. */
  timeoutMs?: number;
}

export type FailureReason = 'exit-code' | 'timeout' | 'environment' | 'cancelled';

interface StepResultBase {
  name: string;
  command: string;
}

export interface StepSuccess extends StepResultBase {
  status: 'success';
  exitCode: 0;
  output: string;
  durationMs: number;
}

export interface StepFailure extends StepResultBase {
  status: 'failure';
  reason: FailureReason;
  exitCode: number | null;
  output: string;
  durationMs: number;
  message: string;
}

export interface StepSkipped extends StepResultBase {
  status: 'skipped';
}

export type StepResult = StepSuccess | StepFailure | StepSkipped;

export type CellOutcome = 'success' | 'failure' | 'cancelled';

export interface FailureSummary {
  step: string;
  /** 1-based position of the step in the template. */
  position: number;
  reason: FailureReason;
  exitCode: number | null;
  message: string;
  outputTail: string;
}

export interface CellResult {
  cell: Cell;
  outcome: CellOutcome;
  steps: StepResult[];
  firstFailure?: FailureSummary;
  durationMs: number;
}

export type RunOutcome = 'success' | 'failure';

export interface RunResult {
  outcome: RunOutcome;
  cells: CellResult[];
  failedCells: CellResult[];
  cancelled: boolean;
  durationMs: number;
}

export interface RunHooks {
  onCellStart?(cell: Cell): void;
  onStepFinish?(cell: Cell, step: StepResult): void;
  onCellFinish?(result: CellResult): void;
}

export interface RunJobOptions {
  executor: CommandExecutor;
  environments: EnvironmentProvider;
  /** Cells in flight at once. Steps inside a cell are always sequential. */
  concurrency?: number;
  /** Default per-step timeout. Unset or 0 means no limit. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Lines of output kept in a failure summary. */
  tailLines?: number;
  hooks?: RunHooks;
}

const DEFAULT_TAIL_LINES = 20;

/**
 * Checks the step template against the cells it will run in. Anything
 * reported here would fail identically in every cell, so it is rejected
 * before the first step starts.
 */
export function validateSteps(steps: readonly StepDefinition[], cells: readonly Cell[]): void {
  const issues: string[] = [];

  if (cells.length === 0) {
    issues.push('there are no cells to run');
  }
  if (steps.length === 0) {
    issues.push('at least one step is required');
  }

  const names = new Set<string>();
  steps.forEach((step, i) => {
    const label = step.name.trim() ? `step "${step.name}"` : `step ${i + 1}`;
    if (!step.name.trim()) {
      issues.push(`step ${i + 1} has no name`);
    } else if (names.has(step.name)) {
      issues.push(`${label} is declared more than once`);
    }
    names.add(step.name);

    if (!step.run.trim()) {
      issues.push(`${label} has an empty command`);
    }
    if (step.timeoutMs != null && (!Number.isFinite(step.timeoutMs) || step.timeoutMs < 0)) {
      issues.push(`${label} has an invalid timeout`);
    }

    const templates = [step.run, ...Object.values(step.env ?? {})];
    for (const cell of cells) {
      const unknown = templates.flatMap(matrixReferences).filter((ref) => !(ref in cell.bindings));
      if (unknown.length > 0) {
        issues.push(`${label} references unknown axis ${[...new Set(unknown)].map((u) => `"${u}"`).join(', ')}`);
        break;
      }
      if (!renderTemplate(step.run, cell.bindings).trim()) {
        issues.push(`${label} renders to an empty command for cell ${cell.id}`);
        break;
      }
    }
  });

  if (issues.length > 0) {
    throw new ConfigError('Invalid step template', issues);
  }
}

export function outputTail(output: string, lines = DEFAULT_TAIL_LINES): string {
  const trimmed = output.trimEnd();
  if (!trimmed) return '';
  return trimmed.split('\n').slice(-lines).join('\n');
}

function classify(result: ExecResult, timeoutMs: number | undefined): { reason: FailureReason; message: string } | null {
  if (result.aborted) {
    return { reason: 'cancelled', message: 'Cancelled while running' };
  }
  if (result.timedOut) {
    return { reason: 'timeout', message: `Timed out after ${timeoutMs ?? result.durationMs}ms` };
  }
  if (result.exitCode === 0) {
    return null;
  }
  if (result.notRunnable) {
    return {
      reason: 'environment',
      message: `Command not found or not executable (exit code ${result.exitCode})`,
    };
  }
  return {
    reason: 'exit-code',
    message: result.exitCode === null ? 'Terminated by a signal' : `Exited with code ${result.exitCode}`,
  };
}

function skipped(step: StepDefinition, cell: Cell): StepSkipped {
  return { name: step.name, command: renderTemplate(step.run, cell.bindings), status: 'skipped' };
}

async function runStep(
  step: StepDefinition,
  environment: CellEnvironment,
  options: RunJobOptions,
): Promise<StepSuccess | StepFailure> {
  const { bindings } = environment.cell;
  const command = renderTemplate(step.run, bindings);
  const env = { ...environment.env, ...renderEnv(step.env, bindings) };
  const timeoutMs = step.timeoutMs ?? options.timeoutMs;
  const started = Date.now();

  let result: ExecResult;
  try {
    result = await options.executor.execute(
      command,
      { cwd: environment.cwd, env },
      { timeoutMs, signal: options.signal },
    );
  } catch (error) {
    return {
      name: step.name,
      command,
      status: 'failure',
      reason: 'environment',
      exitCode: null,
      output: '',
      durationMs: Date.now() - started,
      message: errorMessage(error),
    };
  }

  const failure = classify(result, timeoutMs);
  if (!failure) {
    return {
      name: step.name,
      command,
      status: 'success',
      exitCode: 0,
      output: result.output,
      durationMs: result.durationMs,
    };
  }

  return {
    name: step.name,
    command,
    status: 'failure',
    reason: failure.reason,
    exitCode: result.exitCode,
    output: result.output,
    durationMs: result.durationMs,
    message: failure.message,
  };
}

async function runCell(cell: Cell, steps: readonly StepDefinition[], options: RunJobOptions): Promise<CellResult> {
  const started = Date.now();
  const tailLines = options.tailLines ?? DEFAULT_TAIL_LINES;

  if (options.signal?.aborted) {
    return {
      cell,
      outcome: 'cancelled',
      steps: steps.map((s) => skipped(s, cell)),
      durationMs: 0,
    };
  }

  options.hooks?.onCellStart?.(cell);

  const results: StepResult[] = [];
  let firstFailure: FailureSummary | undefined;
  let interrupted = false;

  let environment: CellEnvironment | undefined;
  try {
    environment = await options.environments.acquire(cell);
  } catch (error) {
    const [first] = steps;
    const message = `Could not provision environment: ${errorMessage(error)}`;
    const failed: StepFailure = {
      name: first.name,
      command: renderTemplate(first.run, cell.bindings),
      status: 'failure',
      reason: 'environment',
      exitCode: null,
      output: '',
      durationMs: 0,
      message,
    };
    results.push(failed);
    options.hooks?.onStepFinish?.(cell, failed);
    firstFailure = { step: first.name, position: 1, reason: 'environment', exitCode: null, message, outputTail: '' };
  }

  if (environment) {
    try {
      for (const [i, step] of steps.entries()) {
        if (firstFailure || interrupted) {
          results.push(skipped(step, cell));
          continue;
        }
        if (options.signal?.aborted) {
          interrupted = true;
          results.push(skipped(step, cell));
          continue;
        }

        const result = await runStep(step, environment, options);
        results.push(result);
        options.hooks?.onStepFinish?.(cell, result);

        if (result.status === 'failure') {
          if (result.reason === 'cancelled') {
            interrupted = true;
          } else {
            firstFailure = {
              step: step.name,
              position: i + 1,
              reason: result.reason,
              exitCode: result.exitCode,
              message: result.message,
              outputTail: outputTail(result.output, tailLines),
            };
          }
        }
      }
    } finally {
      try {
        await environment.release();
      } catch (error) {
        logger.warn(`Could not clean up workspace for cell ${cell.id}: ${errorMessage(error)}`);
      }
    }
  } else {
    results.push(...steps.slice(1).map((s) => skipped(s, cell)));
  }

  const outcome: CellOutcome = firstFailure ? 'failure' : interrupted ? 'cancelled' : 'success';
  const cellResult: CellResult = { cell, outcome, steps: results, durationMs: Date.now() - started };
  if (firstFailure) {
    cellResult.firstFailure = firstFailure;
  }
  options.hooks?.onCellFinish?.(cellResult);
  return cellResult;
}

/**
 * Runs the step template in every cell. A failing step skips the rest of
 * its own cell only; other cells always run to completion. Step failures
 * are reported in the result, never thrown. Only template problems throw
 * (ConfigError), and they do so before any cell starts.
 */
export async function runJob(
  cells: readonly Cell[],
  steps: readonly StepDefinition[],
  options: RunJobOptions,
): Promise<RunResult> {
  validateSteps(steps, cells);

  const concurrency = options.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const started = Date.now();
  const results: CellResult[] = new Array<CellResult>(cells.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < cells.length) {
      const index = next++;
      results[index] = await runCell(cells[index], steps, options);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, cells.length) }, () => worker()));

  const failedCells = results.filter((r) => r.outcome !== 'success');
  return {
    outcome: failedCells.length === 0 ? 'success' : 'failure',
    cells: results,
    failedCells,
    cancelled: options.signal?.aborted ?? false,
    durationMs: Date.now() - started,
  };
}

/** Process exit status for a finished run: 0 only when every cell passed. */
export function exitCodeFor(result: RunResult): number {
  return result.outcome === 'success' ? 0 : 1;
}
