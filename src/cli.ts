import { Command } from 'commander';

import { DEFAULT_JOB_FILE } from './core/job-config.js';
import { DEFAULT_EVENT } from './core/triggers.js';
import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

export const program = new Command()
  .name('matrixrun')
  .description(pkg.description)
  .version(pkg.version);

program
  .command('run', { isDefault: true })
  .description('Run the job in every matrix cell and report the outcome')
  .argument('[file]', 'Job file', DEFAULT_JOB_FILE)
  .option('-e, --event <kind>', 'Event that triggered the run (push, pull_request, ...)', DEFAULT_EVENT)
  .option('-c, --concurrency <n>', 'Cells to run at the same time')
  .option('-t, --timeout-minutes <n>', 'Per-step timeout')
  .option('--cwd <dir>', 'Source directory copied into each cell workspace')
  .option('--workdir <dir>', 'Where cell workspaces are created (default: OS temp dir)')
  .option('--keep-workspaces', 'Leave cell workspaces on disk after the run')
  .option('--json <file>', 'Write the structured result to a JSON file')
  .option('--dry-run', 'Print the expanded plan without running anything')
  .action(
    async (
      file: string,
      options: {
        event?: string;
        concurrency?: string;
        timeoutMinutes?: string;
        cwd?: string;
        workdir?: string;
        keepWorkspaces?: boolean;
        json?: string;
        dryRun?: boolean;
      },
    ) => {
      const { runCommand } = await import('./commands/run.js');
      process.exitCode = await runCommand({ file, ...options });
    },
  );

program
  .command('plan')
  .description('Expand the matrix and print every cell with its resolved commands')
  .argument('[file]', 'Job file', DEFAULT_JOB_FILE)
  .action(async (file: string) => {
    const { planCommand } = await import('./commands/plan.js');
    await planCommand({ file });
  });
