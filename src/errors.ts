/**
 * Error hierarchy for a streaming session.
 *
 * `kind` places every error in one of three buckets: `startup` errors happen
 * before anything is running, `runtime` errors end a running session, and
 * `shutdown` errors are logged while the session is already ending.
 */

export type ErrorKind = 'startup' | 'runtime' | 'shutdown';

export class StreamError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown; metadata?: Record<string, unknown> },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.metadata = options?.metadata ?? {};
  }

  readonly metadata: Record<string, unknown>;

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined,
      metadata: this.metadata,
    };
  }

  static isStreamError(error: unknown): error is StreamError {
    return error instanceof StreamError;
  }
}

/** Exit status of an external process. */
export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

function describeExit({ code, signal }: ExitStatus): string {
  return signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
}

export class CaptureStartError extends StreamError {
  constructor(command: string, cause?: unknown) {
    super(`Failed to start capture process "${command}"`, 'CAPTURE_START_FAILED', 'startup', {
      cause,
      metadata: { command },
    });
  }
}

export class CaptureExitError extends StreamError {
  constructor(public readonly exit: ExitStatus) {
    super(`Capture process exited abnormally with ${describeExit(exit)}`, 'CAPTURE_EXITED_ABNORMALLY', 'runtime', {
      metadata: { ...exit },
    });
  }
}

export class MuxStartError extends StreamError {
  constructor(command: string, cause?: unknown) {
    super(`Failed to start muxer "${command}"`, 'MUX_START_FAILED', 'startup', {
      cause,
      metadata: { command },
    });
  }
}

export class MuxExitError extends StreamError {
  constructor(public readonly exit: ExitStatus) {
    super(`Muxer exited abnormally with ${describeExit(exit)}`, 'MUX_EXITED_ABNORMALLY', 'runtime', {
      metadata: { ...exit },
    });
  }
}

export class InvalidDirectoryError extends StreamError {
  constructor(public readonly directory: string) {
    super(`Directory does not exist: ${directory}`, 'INVALID_DIRECTORY', 'startup', {
      metadata: { directory },
    });
  }
}

export class ServeError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SERVE_FAILED', 'runtime', { cause });
  }
}

export class NotStartedError extends StreamError {
  constructor(what: string) {
    super(`${what}: not started`, 'NOT_STARTED', 'runtime');
  }
}

export class AlreadyStartedError extends StreamError {
  constructor(what: string) {
    super(`${what}: already started`, 'ALREADY_STARTED', 'startup');
  }
}

export class ConfigError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_CONFIG', 'startup', { cause });
  }
}

/** Render an unknown thrown value as a one-line message. */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  }
  return String(error);
}

/** Wrap an unknown thrown value so it can be attached as a cause. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
