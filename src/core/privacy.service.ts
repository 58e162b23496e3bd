import { request } from 'undici';
import { CommandRunner } from './command.runner';
import { BaseError, errorMessage } from '../errors/base.error';
import { SecurityBlockedError } from '../errors/sync.error';
import { RepositoryHandle } from '../types/sync.types';
import { DEFAULT_PROBE_TIMEOUT_MS } from '../types/config.types';
import { resolveCloneUrl, resolveWebUrl } from '../utils/repository-url';
import { gitEnvironment } from '../utils/git-env';

/**
 * Unauthenticated reachability check of a repository's public web page
 */
export interface PublicProbe {
  isPubliclyReachable(url: string): Promise<boolean>;
}

/**
 * HEAD request without credentials; any status below 400 means reachable
 */
export class HttpPublicProbe implements PublicProbe {
  private readonly timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  public async isPubliclyReachable(url: string): Promise<boolean> {
    try {
      const { statusCode, body } = await request(url, {
        method: 'HEAD',
        headers: { 'User-Agent': 'anvil-privacy-check' },
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      await body.dump();
      return statusCode < 400;
    } catch {
      // unreachable without credentials
      return false;
    }
  }
}

export type PrivacyVerdict =
  | { status: 'ok' }
  | { status: 'blocked'; error: SecurityBlockedError };

/**
 * Privacy gate run before every push.
 *
 * 1. Authenticated `git ls-remote <url> HEAD`; failure blocks (fail closed).
 * 2. Unauthenticated probe of the public web URL; success blocks.
 * 3. Otherwise the repository is treated as private.
 */
export class PrivacyGateService {
  private readonly runner: CommandRunner;
  private readonly probe: PublicProbe;

  constructor(runner?: CommandRunner, probe?: PublicProbe) {
    this.runner = runner || new CommandRunner();
    this.probe = probe || new HttpPublicProbe();
  }

  public async verifyPrivate(handle: RepositoryHandle): Promise<PrivacyVerdict> {
    const repository = handle.remoteIdentifier;

    const accessDetails = await this.checkAuthenticatedAccess(handle);
    if (accessDetails !== undefined) {
      return {
        status: 'blocked',
        error: new SecurityBlockedError('AUTHENTICATION_FAILED', repository, accessDetails),
      };
    }

    const webUrl = resolveWebUrl(repository);
    if (webUrl !== undefined && (await this.probe.isPubliclyReachable(webUrl))) {
      return {
        status: 'blocked',
        error: new SecurityBlockedError('PUBLIC_REPOSITORY', repository, `Reachable without credentials: ${webUrl}`),
      };
    }

    return { status: 'ok' };
  }

  /**
   * Throwing form used by the orchestrator
   */
  public async assertPrivate(handle: RepositoryHandle): Promise<void> {
    const verdict = await this.verifyPrivate(handle);
    if (verdict.status === 'blocked') {
      throw verdict.error;
    }
  }

  /**
   * Undefined when access works, otherwise the diagnostic to surface
   */
  private async checkAuthenticatedAccess(handle: RepositoryHandle): Promise<string | undefined> {
    try {
      const result = await this.runner.run('git', ['ls-remote', resolveCloneUrl(handle), 'HEAD'], {
        env: gitEnvironment(handle),
      });
      if (result.succeeded) {
        return undefined;
      }
      return result.stderr.trim() || `git ls-remote exited with code ${result.exitCode}`;
    } catch (error) {
      return error instanceof BaseError && error.details ? error.details : errorMessage(error);
    }
  }
}
