import { BaseError } from './base.error';

/**
 * External process exceeded its time budget and was killed
 */
export class CommandTimeoutError extends BaseError {
  public readonly code = 'COMMAND_TIMEOUT';
  public readonly recoverable = true;
  public readonly command: string;
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number, details?: string) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, details);
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * External process could not be started (missing binary, bad cwd)
 */
export class CommandSpawnError extends BaseError {
  public readonly code = 'COMMAND_SPAWN_FAILED';
  public readonly recoverable = false;
  public readonly command: string;

  constructor(command: string, details?: string) {
    super(`Failed to start command: ${command}`, details);
    this.command = command;
  }
}
