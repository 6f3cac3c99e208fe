import chalk from 'chalk';

import type { CellResult, RunResult, StepResult } from '../core/job-runner.js';
import { logger } from './logger.js';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatStepLine(cellId: string, step: StepResult): string {
  if (step.status === 'skipped') {
    return `[${cellId}] ${step.name}: skipped`;
  }
  if (step.status === 'success') {
    return `[${cellId}] ${step.name} (${formatDuration(step.durationMs)})`;
  }
  return `[${cellId}] ${step.name}: ${step.message} [${step.reason}]`;
}

export function formatCellLine(result: CellResult): string {
  const { cell } = result;
  switch (result.outcome) {
    case 'success':
      return `${cell.id}: passed (${result.steps.length} steps, ${formatDuration(result.durationMs)})`;
    case 'cancelled':
      return `${cell.id}: cancelled`;
    case 'failure': {
      const failure = result.firstFailure;
      if (!failure) return `${cell.id}: failed`;
      return `${cell.id}: failed at step ${failure.position} "${failure.step}": ${failure.message} [${failure.reason}]`;
    }
    default: {
      const _exhaustive: never = result.outcome;
      throw new Error(`Unknown cell outcome: ${String(_exhaustive)}`);
    }
  }
}

export function formatTotals(result: RunResult): string {
  const passed = result.cells.filter((c) => c.outcome === 'success').length;
  const parts = [`${passed}/${result.cells.length} cells passed`];
  const cancelled = result.cells.filter((c) => c.outcome === 'cancelled').length;
  if (cancelled > 0) parts.push(`${cancelled} cancelled`);
  parts.push(`in ${formatDuration(result.durationMs)}`);
  return parts.join(', ');
}

export function printSummary(result: RunResult, jobName: string): void {
  logger.header(`Summary: ${jobName}`);

  for (const cell of result.cells) {
    const line = formatCellLine(cell);
    if (cell.outcome === 'success') {
      logger.success(line);
    } else if (cell.outcome === 'cancelled') {
      logger.skipped(line);
    } else {
      logger.error(line);
      const tail = cell.firstFailure?.outputTail;
      if (tail) {
        for (const tailLine of tail.split('\n')) {
          console.error(chalk.dim(`    │ ${tailLine}`));
        }
      }
    }
  }

  console.log();
  if (result.outcome === 'success') {
    logger.success(formatTotals(result));
  } else {
    logger.error(formatTotals(result));
  }
}
