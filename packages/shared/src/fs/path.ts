import path from 'node:path';
import os from 'node:os';

/** Rewrites backslashes so log and archive paths read the same on every host. */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/** `path.join` with forward slashes in the result. */
export function join(...segments: string[]): string {
  return normalizePath(path.join(...segments));
}

export function isWindows(): boolean {
  return os.platform() === 'win32';
}
