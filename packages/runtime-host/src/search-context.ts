/**
 * Stepwise Runtime Host - Configuration Search Context Resolution
 *
 * Builds the ConfigSearchContext handed to the configuration resolver.
 *
 * Application data root precedence:
 *
 *   1. Explicit `appDataDir` option (e.g. from --app-data CLI flag)  - overridden
 *   2. STEPWISE_DATA_DIR environment variable                         - overridden
 *   3. Default installed root (/usr/share/calamares)                  - not overridden
 *
 * An overridden root is the only place module configuration is searched;
 * the default root is the last of three layered candidates.
 *
 * Debug mode: explicit `debug` option, else STEPWISE_DEBUG set to "1" or "true".
 *
 * This is the only place outside the CLI that reads the environment.
 */

import { resolve } from 'node:path';
import type { ConfigSearchContext } from '@stepwise/kernel';
import { DEFAULT_APP_DATA_DIR, SYSTEM_MODULES_CONFIG_DIR } from '@stepwise/kernel';

export const DATA_DIR_ENV = 'STEPWISE_DATA_DIR';
export const DEBUG_ENV = 'STEPWISE_DEBUG';

/**
 * Options for search context resolution. Every field is optional; absent
 * fields fall back to the environment and then to the installed defaults.
 */
export interface ResolveSearchContextOptions {
  /** Explicit application data root; marks the root as overridden. */
  readonly appDataDir?: string | undefined;
  readonly debug?: boolean | undefined;
  /** Working directory for the debug search path. Default: process.cwd(). */
  readonly currentDir?: string | undefined;
  /** Administrator config directory. Default: /etc/calamares/modules. */
  readonly systemConfigDir?: string | undefined;
  /** Environment to read instead of process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the configuration search context.
 *
 * Paths are returned absolute. Nothing is created or checked on disk; a root
 * that does not exist simply yields no candidates that exist.
 */
export function resolveSearchContext(opts?: ResolveSearchContextOptions): ConfigSearchContext {
  const env = opts?.env ?? process.env;
  const currentDir = resolve(opts?.currentDir ?? process.cwd());

  let appDataDir: string;
  let appDataDirOverridden: boolean;
  const envDataDir = env[DATA_DIR_ENV];

  if (typeof opts?.appDataDir === 'string' && opts.appDataDir !== '') {
    // 1. Explicit override
    appDataDir = resolve(currentDir, opts.appDataDir);
    appDataDirOverridden = true;
  } else if (typeof envDataDir === 'string' && envDataDir !== '') {
    // 2. Environment override
    appDataDir = resolve(currentDir, envDataDir);
    appDataDirOverridden = true;
  } else {
    // 3. Installed default
    appDataDir = DEFAULT_APP_DATA_DIR;
    appDataDirOverridden = false;
  }

  return {
    appDataDir,
    appDataDirOverridden,
    debugMode: opts?.debug ?? isTruthyFlag(env[DEBUG_ENV]),
    currentDir,
    systemConfigDir: resolve(opts?.systemConfigDir ?? SYSTEM_MODULES_CONFIG_DIR),
  };
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}
