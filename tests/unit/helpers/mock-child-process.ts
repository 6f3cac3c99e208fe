import { EventEmitter } from 'node:events';

export interface MockChild extends EventEmitter {
  stdout: EventEmitter;
  stderr: EventEmitter;
  pid: number | undefined;
  exitCode: number | null;
  signalCode: NodeJS.Signals | null;
  kill: ReturnType<typeof vi.fn>;
}

export interface MockChildOptions {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  /** Never exits on its own; only kill() closes it. */
  hang?: boolean;
  /** Emitted instead of closing, as when the shell cannot be spawned. */
  error?: Error;
}

export function createMockChild(options: MockChildOptions = {}): MockChild {
  const props: Pick<MockChild, 'stdout' | 'stderr' | 'pid' | 'exitCode' | 'signalCode' | 'kill'> = {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
    pid: undefined,
    exitCode: null,
    signalCode: null,
    kill: vi.fn(),
  };
  const child: MockChild = Object.assign(new EventEmitter(), props);

  child.kill.mockImplementation((signal: NodeJS.Signals = 'SIGTERM') => {
    child.signalCode = signal;
    setTimeout(() => child.emit('close', null, signal), 0);
    return true;
  });

  setTimeout(() => {
    if (options.error) {
      child.emit('error', options.error);
      return;
    }
    if (options.stdout) child.stdout.emit('data', Buffer.from(options.stdout));
    if (options.stderr) child.stderr.emit('data', Buffer.from(options.stderr));
    if (!options.hang) {
      child.exitCode = options.exitCode ?? 0;
      child.emit('close', child.exitCode, null);
    }
  }, 0);

  return child;
}
