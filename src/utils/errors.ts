export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class JobFileNotFoundError extends ConfigError {
  readonly path: string;

  constructor(path: string) {
    super(`Job file not found: ${path}. Pass a path or create matrixrun.yml in the current directory.`);
    this.name = 'JobFileNotFoundError';
    this.path = path;
  }
}

/**
 * The executor could not run the command at all (missing shell, bad cwd,
 * spawn failure). Distinct from a command that ran and exited non-zero.
 */
export class ExecutorError extends Error {
  readonly command: string;

  constructor(command: string, message: string) {
    super(`Failed to execute "${command}": ${message}`);
    this.name = 'ExecutorError';
    this.command = command;
  }
}

export class WorkspaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkspaceError';
  }
}

/** Process exit status for an error that ended the CLI: 2 for a bad job definition, 1 otherwise. */
export function exitCodeForError(error: unknown): number {
  return error instanceof ConfigError ? 2 : 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
