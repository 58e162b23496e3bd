import { RepositoryHandle } from '../types/sync.types';

/**
 * Parent variables git needs to find its binary, config, SSH agent, locale and
 * proxies. Editors, pagers and askpass helpers are never handed down.
 */
const PASSTHROUGH_VARIABLES = [
  'PATH',
  'HOME',
  'USERPROFILE',
  'SYSTEMROOT',
  'TMPDIR',
  'TEMP',
  'TMP',
  'XDG_CONFIG_HOME',
  'SSH_AUTH_SOCK',
  'LANG',
  'LANGUAGE',
  'LC_ALL',
  'LC_CTYPE',
  'LC_MESSAGES',
  'GIT_CEILING_DIRECTORIES',
  'HTTP_PROXY',
  'HTTPS_PROXY',
  'NO_PROXY',
  'http_proxy',
  'https_proxy',
  'no_proxy',
];

/**
 * Environment overrides for every git invocation against the handle's remote.
 * Prompts are disabled so a missing credential fails instead of hanging; the SSH
 * key is only used when no token is configured.
 */
export function gitEnvironment(
  handle: Pick<RepositoryHandle, 'authToken' | 'sshKeyPath'>,
): Record<string, string> {
  const env: Record<string, string> = { GIT_TERMINAL_PROMPT: '0' };
  if (!handle.authToken && handle.sshKeyPath) {
    env['GIT_SSH_COMMAND'] = `ssh -i "${handle.sshKeyPath}" -o IdentitiesOnly=yes`;
  }
  return env;
}

/**
 * Complete environment for a git child process: the passthrough subset of
 * `parent` plus the handle's overrides
 */
export function gitProcessEnvironment(
  handle: Pick<RepositoryHandle, 'authToken' | 'sshKeyPath'>,
  parent: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of PASSTHROUGH_VARIABLES) {
    const value = parent[name];
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return { ...env, ...gitEnvironment(handle) };
}
