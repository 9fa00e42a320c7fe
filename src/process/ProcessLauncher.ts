import { spawn, type ChildProcess } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { logger } from '../logger.js';
import type { ExitStatus } from '../errors.js';

export interface LaunchOptions {
  /** Pipe the process's stdin so the caller can write to it. */
  stdin?: boolean;
  /** Pipe the process's stdout so the caller can read from it. */
  stdout?: boolean;
}

/**
 * A launched OS process, reduced to what the pipeline needs.
 *
 * `spawned` settles once: resolved when the OS started the process, rejected
 * when it could not be launched. `exited` never rejects.
 */
export interface LaunchedProcess {
  readonly command: string;
  readonly args: readonly string[];
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly spawned: Promise<void>;
  readonly exited: Promise<ExitStatus>;
  kill(signal: NodeJS.Signals): void;
}

export interface ProcessLauncher {
  launch(command: string, args: readonly string[], options?: LaunchOptions): LaunchedProcess;
}

class SpawnedProcess implements LaunchedProcess {
  readonly spawned: Promise<void>;
  readonly exited: Promise<ExitStatus>;

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    private child: ChildProcess,
  ) {
    this.spawned = new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });

    // A failed spawn emits 'error' and 'close' but never 'exit'
    this.exited = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => resolve({ code, signal }));
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
    });

    child.on('error', (err) => {
      logger.debug(`[process] ${command}: ${err.message}`);
    });
  }

  get stdin(): Writable | null {
    return this.child.stdin;
  }

  get stdout(): Readable | null {
    return this.child.stdout;
  }

  get stderr(): Readable | null {
    return this.child.stderr;
  }

  kill(signal: NodeJS.Signals): void {
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill(signal);
    }
  }
}

/**
 * Launches real OS processes with `child_process.spawn`, each in its own
 * process group so a terminal's Ctrl-C reaches only this process. Children
 * are stopped through their pipes or by signal from the pipeline.
 */
export class ChildProcessLauncher implements ProcessLauncher {
  launch(command: string, args: readonly string[], options: LaunchOptions = {}): LaunchedProcess {
    const child = spawn(command, [...args], {
      stdio: [options.stdin ? 'pipe' : 'ignore', options.stdout ? 'pipe' : 'ignore', 'pipe'],
      detached: true,
      windowsHide: true,
    });
    return new SpawnedProcess(command, args, child);
  }
}
