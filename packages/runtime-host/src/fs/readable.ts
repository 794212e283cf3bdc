/**
 * Stepwise Runtime Host - Readability Probes
 *
 * Synchronous existence/readability checks used by the module factory and
 * the configuration resolver. Module construction runs once at startup, so
 * blocking I/O is acceptable and keeps the build a single synchronous call.
 *
 * Error handling: "not there" and "not readable" errno codes are expected
 * outcomes and map to false / null. Any other I/O error is rethrown.
 */

import { accessSync, constants, readFileSync, statSync } from 'node:fs';

/** errno codes meaning the path is absent or cannot be opened for reading. */
const UNREADABLE_CODES: ReadonlySet<string> = new Set([
  'ENOENT',
  'ENOTDIR',
  'EACCES',
  'EPERM',
  'EISDIR',
  'ELOOP',
]);

/**
 * True if `path` exists, is a directory, and the current process may read it.
 */
export function isReadableDirectory(path: string): boolean {
  try {
    const stat = statSync(path, { throwIfNoEntry: false });
    if (stat === undefined || !stat.isDirectory()) {
      return false;
    }
    accessSync(path, constants.R_OK);
    return true;
  } catch (err: unknown) {
    if (isUnreadableError(err)) {
      return false;
    }
    throw err;
  }
}

/**
 * Read a regular file as UTF-8 text.
 *
 * Returns null if the path does not exist, is not a regular file, or cannot
 * be opened for reading. The file handle is opened and released within the
 * single readFileSync call.
 */
export function readTextIfReadable(path: string): string | null {
  try {
    const stat = statSync(path, { throwIfNoEntry: false });
    if (stat === undefined || !stat.isFile()) {
      return null;
    }
    return readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isUnreadableError(err)) {
      return null;
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}

function isUnreadableError(err: unknown): boolean {
  for (const code of UNREADABLE_CODES) {
    if (isNodeError(err, code)) {
      return true;
    }
  }
  return false;
}
