import { spawn, ChildProcess } from 'child_process';
import { CommandSpawnError, CommandTimeoutError } from '../errors/command.error';
import { errorMessage } from '../errors/base.error';
import { DEFAULT_GIT_TIMEOUT_MS } from '../types/config.types';
import { redactCredentials } from '../utils/repository-url';

/**
 * Captured outcome of an external process
 */
export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  succeeded: boolean;
}

export interface RunOptions {
  /** Working directory for the child; the parent's cwd is never changed */
  cwd?: string | undefined;
  timeoutMs?: number | undefined;
  /** Merged over the parent environment */
  env?: Record<string, string | undefined> | undefined;
}

/**
 * Runs external processes with a bounded timeout.
 *
 * A non-zero exit is a normal result. Only a process that cannot be started
 * (`CommandSpawnError`) or one that outlives its timeout (`CommandTimeoutError`)
 * rejects; on timeout the whole process group is killed.
 */
export class CommandRunner {
  private readonly defaultTimeoutMs: number;

  constructor(defaultTimeoutMs: number = DEFAULT_GIT_TIMEOUT_MS) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  public run(command: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const display = redactCredentials([command, ...args].join(' '));
    const detached = process.platform !== 'win32';

    return new Promise<ProcessResult>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          detached,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        reject(new CommandSpawnError(display, errorMessage(error)));
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        this.killTree(child, detached);
      }, timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', error => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(new CommandSpawnError(display, error.message));
      });

      child.on('close', code => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);

        const errText = redactCredentials(Buffer.concat(stderr).toString('utf8'));
        if (timedOut) {
          reject(new CommandTimeoutError(display, timeoutMs, errText));
          return;
        }

        const exitCode = code ?? 1;
        resolve({
          exitCode,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: errText,
          succeeded: exitCode === 0,
        });
      });
    });
  }

  /**
   * Kill the child and everything it spawned
   */
  private killTree(child: ChildProcess, detached: boolean): void {
    if (child.pid === undefined) {
      return;
    }
    try {
      if (detached) {
        process.kill(-child.pid, 'SIGKILL');
      } else {
        child.kill('SIGKILL');
      }
    } catch {
      // group already gone; make sure the direct child is too
      child.kill('SIGKILL');
    }
  }
}
