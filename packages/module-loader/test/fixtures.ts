/**
 * Shared fixtures for module-loader tests: a throwaway directory tree that
 * stands in for the installed data root, the administrator directory, the
 * working directory and module directories.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ConfigSearchContext } from '@stepwise/kernel';

export interface Sandbox {
  readonly root: string;
  /** Installed data root; configs go in `<appDataDir>/modules/`. */
  readonly appDataDir: string;
  /** Stands in for /etc/calamares/modules. */
  readonly systemConfigDir: string;
  readonly currentDir: string;
  /** A context over this sandbox: no override, debug off unless overridden. */
  context(overrides?: Partial<ConfigSearchContext>): ConfigSearchContext;
  /** Create `<root>/modules-src/<name>/` and return it. */
  moduleDir(name: string): string;
  /** Write `text` to `path`, creating parent directories. */
  write(path: string, text: string): string;
}

export function createSandbox(): Sandbox {
  const root = mkdtempSync(join(tmpdir(), 'stepwise-modules-'));
  const appDataDir = join(root, 'share');
  const systemConfigDir = join(root, 'etc', 'modules');
  const currentDir = join(root, 'work');
  for (const dir of [appDataDir, systemConfigDir, currentDir]) {
    mkdirSync(dir, { recursive: true });
  }

  return {
    root,
    appDataDir,
    systemConfigDir,
    currentDir,
    context: (overrides) => ({
      appDataDir,
      appDataDirOverridden: false,
      debugMode: false,
      currentDir,
      systemConfigDir,
      ...overrides,
    }),
    moduleDir: (name) => {
      const dir = join(root, 'modules-src', name);
      mkdirSync(dir, { recursive: true });
      return dir;
    },
    write: (path, text) => {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, text);
      return path;
    },
  };
}
