import * as os from 'os';
import * as path from 'path';

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHome(input: string, home: string = os.homedir()): string {
  if (input === '~') {
    return home;
  }
  if (input.startsWith('~/')) {
    return path.join(home, input.slice(2));
  }
  return input;
}

/**
 * Convert a platform path to the POSIX form git reports
 */
export function toPosix(input: string): string {
  return input.split(path.sep).join('/');
}

/**
 * Repo-relative path: POSIX separators, no leading or trailing slash
 */
export function toRepoRelative(input: string): string {
  return toPosix(input).replace(/^\/+/, '').replace(/\/+$/, '');
}

const TARGET_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;
const RESERVED_TARGET_NAMES = new Set(['.', '..', '.git']);

/**
 * True for a name usable as a top-level directory of the config repository:
 * one path segment, never `.`, `..` or `.git`
 */
export function isValidTargetName(name: string): boolean {
  return TARGET_NAME_PATTERN.test(name) && !RESERVED_TARGET_NAMES.has(name.toLowerCase());
}

/**
 * True when `candidate` resolves strictly inside `root`
 */
export function isStrictlyInside(root: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  return (
    relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative)
  );
}
