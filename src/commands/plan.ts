import chalk from 'chalk';

import { loadJobConfig } from '../core/job-config.js';
import type { JobConfig } from '../core/job-config.js';
import { describeCell, expandMatrix } from '../core/matrix.js';
import type { Cell } from '../core/matrix.js';
import { validateSteps } from '../core/job-runner.js';
import { logger } from '../ui/logger.js';
import { renderTemplate } from '../utils/template.js';

export interface PlanOptions {
  file?: string;
}

/** Expands and validates the job without running anything. */
export function buildPlan(job: JobConfig): Cell[] {
  const cells = expandMatrix(job.axes, { include: job.include, exclude: job.exclude });
  validateSteps(job.steps, cells);
  return cells;
}

export function printPlan(job: JobConfig, cells: readonly Cell[]): void {
  logger.header(`${job.name}: ${cells.length} cell${cells.length === 1 ? '' : 's'} × ${job.steps.length} steps`);
  logger.dim(`Triggers: ${job.triggers.join(', ')}`);
  console.log();

  for (const cell of cells) {
    console.log(chalk.bold(`Cell ${cell.index + 1}: ${describeCell(cell)}`));
    job.steps.forEach((step, i) => {
      const command = renderTemplate(step.run, cell.bindings).trim().split('\n');
      console.log(`  ${i + 1}. ${step.name}`);
      for (const line of command) {
        logger.dim(`       $ ${line}`);
      }
    });
    console.log();
  }
}

export async function planCommand(options: PlanOptions): Promise<void> {
  const job = await loadJobConfig(options.file);
  const cells = buildPlan(job);
  printPlan(job, cells);
}
