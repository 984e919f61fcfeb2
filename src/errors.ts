export class HarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HarnessError';
  }
}

export class ExecutableNotFoundError extends HarnessError {
  readonly executable: string;

  constructor(executable: string) {
    super(`Interpreter not found at ${executable}`);
    this.name = 'ExecutableNotFoundError';
    this.executable = executable;
  }
}

export class ExecutableNotRunnableError extends HarnessError {
  readonly executable: string;

  constructor(executable: string) {
    super(`Interpreter at ${executable} is not executable`);
    this.name = 'ExecutableNotRunnableError';
    this.executable = executable;
  }
}

export type PreconditionError =
  | ExecutableNotFoundError
  | ExecutableNotRunnableError;

export function isPreconditionError(
  error: unknown,
): error is PreconditionError {
  return (
    error instanceof ExecutableNotFoundError ||
    error instanceof ExecutableNotRunnableError
  );
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut?: boolean;
}

/**
 * The interpreter ran but did not exit cleanly: a non-zero status, a
 * terminating signal, or a kill after the configured timeout.
 */
export class ExitError extends HarnessError {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  readonly command: string[];
  readonly stdout: Buffer;

  constructor(status: ExitStatus, command: string[], stdout: Buffer) {
    super(formatExitMessage(status, command));
    this.name = 'ExitError';
    this.code = status.code;
    this.signal = status.signal;
    this.timedOut = status.timedOut ?? false;
    this.command = command;
    this.stdout = stdout;
  }
}

function formatExitMessage(status: ExitStatus, command: string[]): string {
  const code = status.code !== null ? `code: ${status.code}` : null;
  const signal = status.signal ? `signal: ${status.signal}` : null;
  const timedOut = status.timedOut ? 'timed out' : null;
  const cmd = `$ ${command.join(' ')}`;

  return [code, signal, timedOut, cmd]
    .filter((item): item is string => !!item)
    .join(', ');
}

export class InterruptedError extends HarnessError {
  constructor(message = 'Execution interrupted by user') {
    super(message);
    this.name = 'InterruptedError';
  }
}

export class ScriptDecodeError extends HarnessError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`File is not valid UTF-8 text: ${filePath}`);
    this.name = 'ScriptDecodeError';
    this.filePath = filePath;
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
