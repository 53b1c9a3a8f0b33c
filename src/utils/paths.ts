import { homedir } from 'node:os';
import { join } from 'node:path';

/** Expands a leading `~` to the user's home directory. */
export function expandPath(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
