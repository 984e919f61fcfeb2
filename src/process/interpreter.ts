import { spawn } from 'child_process';
import * as fs from 'fs';
import {
  ExecutableNotFoundError,
  ExecutableNotRunnableError,
  ExitError,
  InterruptedError,
  isPreconditionError,
} from '../errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_EXECUTABLE = './build/cslo';

export const DEFAULT_KILL_GRACE_MS = 1000;

export type ExecutionOutcome =
  | { type: 'success'; stdout: Buffer }
  | { type: 'exit-failure'; error: ExitError }
  | { type: 'launch-failure'; error: Error };

export interface InterpreterOptions {
  executable?: string;
  /** Kill a script that runs longer than this. Unset means wait forever. */
  timeoutMs?: number;
  /** After an interrupt, how long a script gets to exit on SIGTERM before SIGKILL. */
  killGraceMs?: number;
  logger?: Logger;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class Interpreter {
  readonly executable: string;
  readonly timeoutMs?: number;
  readonly killGraceMs: number;
  private logger: Logger;

  constructor(options: InterpreterOptions = {}) {
    this.executable = options.executable ?? DEFAULT_EXECUTABLE;
    this.timeoutMs = options.timeoutMs;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async checkExecutable(): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(this.executable);
    } catch (error) {
      if (
        isErrnoException(error) &&
        (error.code === 'ENOENT' || error.code === 'ENOTDIR')
      ) {
        throw new ExecutableNotFoundError(this.executable);
      }
      throw error;
    }

    if (!stat.isFile()) {
      throw new ExecutableNotFoundError(this.executable);
    }

    try {
      await fs.promises.access(this.executable, fs.constants.X_OK);
    } catch (error) {
      this.logger.debug('access check failed: %s', error);
      throw new ExecutableNotRunnableError(this.executable);
    }
  }

  /**
   * Runs one script. Exit failures and launch failures are returned, not
   * thrown; only an aborted `signal` rejects, with `InterruptedError`, and
   * only after the child has exited (SIGTERM, then SIGKILL after
   * `killGraceMs`).
   */
  async run(
    scriptPath: string,
    options: InvokeOptions = {},
  ): Promise<ExecutionOutcome> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new InterruptedError();
    }

    this.logger.debug('Binary path is: %s', this.executable);
    try {
      await this.checkExecutable();
    } catch (error) {
      if (isPreconditionError(error)) {
        return { type: 'launch-failure', error };
      }
      throw error;
    }

    if (signal?.aborted) {
      throw new InterruptedError();
    }

    return this.spawnInterpreter(scriptPath, signal);
  }

  private spawnInterpreter(
    scriptPath: string,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionOutcome> {
    const command = [this.executable, scriptPath];

    return new Promise<ExecutionOutcome>((resolve, reject) => {
      const child = spawn(this.executable, [scriptPath], {
        stdio: ['ignore', 'pipe', 'ignore'],
      });

      const chunks: Buffer[] = [];
      let settled = false;
      let interrupted = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (settle: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        settle();
      };

      // The promise settles from `close`, once the child is gone.
      const onAbort = () => {
        interrupted = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          this.logger.debug('%s ignored SIGTERM, sending SIGKILL', scriptPath);
          child.kill('SIGKILL');
        }, this.killGraceMs);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      if (this.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, this.timeoutMs);
      }

      child.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      child.on('error', (error) => {
        if (interrupted) {
          finish(() => reject(new InterruptedError()));
        } else {
          finish(() => resolve({ type: 'launch-failure', error }));
        }
      });

      child.on('exit', () => {
        // Processes the script started may still hold the pipe open.
        if (interrupted || timedOut) {
          child.stdout.destroy();
        }
      });

      child.on('close', (code, exitSignal) => {
        const stdout = Buffer.concat(chunks);
        if (interrupted) {
          finish(() => reject(new InterruptedError()));
        } else if (timedOut) {
          finish(() =>
            resolve({
              type: 'exit-failure',
              error: new ExitError(
                { code, signal: exitSignal, timedOut: true },
                command,
                stdout,
              ),
            }),
          );
        } else if (code === 0) {
          finish(() => resolve({ type: 'success', stdout }));
        } else {
          finish(() =>
            resolve({
              type: 'exit-failure',
              error: new ExitError(
                { code, signal: exitSignal },
                command,
                stdout,
              ),
            }),
          );
        }
      });
    });
  }
}
