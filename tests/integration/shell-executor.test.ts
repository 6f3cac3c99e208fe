import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ShellExecutor } from '../../src/core/executor.js';
import type { ExecutionEnvironment } from '../../src/core/executor.js';
import { cellEnvVars } from '../../src/core/environment.js';
import type { EnvironmentProvider } from '../../src/core/environment.js';
import { runJob } from '../../src/core/job-runner.js';
import { expandMatrix } from '../../src/core/matrix.js';

vi.mock('../../src/ui/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), success: vi.fn() },
}));

const PATH = process.env.PATH ?? '/usr/bin:/bin';

describe.skipIf(process.platform === 'win32')('ShellExecutor against a real shell', () => {
  let dir: string;
  let environment: ExecutionEnvironment;
  const executor = new ShellExecutor({ killGraceMs: 1_000 });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'matrixrun-shell-'));
    environment = { cwd: dir, env: { PATH, MATRIX_VERSION: '3.9' } };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should interleave stdout and stderr in arrival order', async () => {
    const result = await executor.execute('echo one; sleep 0.1; echo two >&2; sleep 0.1; echo three', environment);

    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('one\ntwo\nthree\n');
    expect(result.notRunnable).toBe(false);
  });

  it('should run in the cell directory with the cell environment', async () => {
    await executor.execute(`printf '%s' "$MATRIX_VERSION" > marker.txt`, environment);

    expect(await readFile(join(dir, 'marker.txt'), 'utf-8')).toBe('3.9');
  });

  it('should resolve with the exit code of a failing command', async () => {
    const result = await executor.execute('echo failing >&2; exit 3', environment);

    expect(result.exitCode).toBe(3);
    expect(result.output).toBe('failing\n');
    expect(result.notRunnable).toBe(false);
  });

  it('should flag a command the shell cannot find', async () => {
    const result = await executor.execute('matrixrun-missing-tool-xyz --version', environment);

    expect(result.exitCode).toBe(127);
    expect(result.notRunnable).toBe(true);
  });

  it('should stop background children when a command times out', async () => {
    const result = await executor.execute('sleep 30 & sleep 30', environment, { timeoutMs: 300 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.durationMs).toBeLessThan(5_000);
  });

  it('should record timeouts and missing tools as step failures in a job', async () => {
    const environments: EnvironmentProvider = {
      acquire: async (cell) => ({
        cell,
        cwd: dir,
        env: { PATH, ...cellEnvVars(cell) },
        release: async () => {},
      }),
    };
    const cells = expandMatrix([{ name: 'tool', values: ['missing', 'slow'] }]);

    const result = await runJob(
      cells,
      [
        {
          name: 'Run tests',
          run: `if [ "$MATRIX_TOOL" = missing ]; then matrixrun-missing-tool-xyz; else sleep 30 & sleep 30; fi`,
          timeoutMs: 300,
        },
        { name: 'Report', run: 'echo done' },
      ],
      { executor, environments, concurrency: 2 },
    );

    expect(result.cells.map((c) => c.steps.map((s) => s.status))).toEqual([
      ['failure', 'skipped'],
      ['failure', 'skipped'],
    ]);
    expect(result.cells[0].firstFailure).toMatchObject({
      reason: 'environment',
      exitCode: 127,
      message: 'Command not found or not executable (exit code 127)',
    });
    expect(result.cells[1].firstFailure).toMatchObject({
      reason: 'timeout',
      exitCode: null,
      message: 'Timed out after 300ms',
    });
    expect(result.durationMs).toBeLessThan(5_000);
  });
});
