/**
 * Stepwise Kernel - Configuration Search Context
 *
 * The read-only inputs the configuration resolver consults when building its
 * candidate path list. The resolver never reads process state itself; the
 * runtime host assembles this record once (see resolveSearchContext) and it
 * is passed down explicitly.
 */

/** Administrator override directory for module configuration files. */
export const SYSTEM_MODULES_CONFIG_DIR = '/etc/calamares/modules';

/** Installed application data root used when nothing overrides it. */
export const DEFAULT_APP_DATA_DIR = '/usr/share/calamares';

export interface ConfigSearchContext {
  /** Application data root; module configs live under `<appDataDir>/modules/`. */
  readonly appDataDir: string;
  /**
   * True when `appDataDir` was explicitly overridden. An overridden root is
   * the only place searched.
   */
  readonly appDataDirOverridden: boolean;
  /** Enables the source-checkout search path under `currentDir`. */
  readonly debugMode: boolean;
  /** Working directory used for the debug search path. */
  readonly currentDir: string;
  /** Administrator directory, normally SYSTEM_MODULES_CONFIG_DIR. */
  readonly systemConfigDir: string;
}
