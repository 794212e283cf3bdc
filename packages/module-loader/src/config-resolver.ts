/**
 * Stepwise Module Loader - Layered Configuration Resolver
 *
 * Finds and parses a module's configuration file. Candidates are tried in
 * precedence order and the FIRST one that exists and opens for reading is
 * used; files are never merged and later candidates are never consulted
 * once one is found, even if it fails to parse.
 *
 * Candidate order:
 *
 *   Application data root overridden:
 *     1. <appDataDir>/modules/<configFileName>                  (only candidate)
 *
 *   Otherwise:
 *     1. <currentDir>/src/modules/<moduleName>/<configFileName> (debug mode only)
 *     2. <systemConfigDir>/<configFileName>                     (/etc/calamares/modules)
 *     3. <appDataDir>/modules/<configFileName>                  (installed default)
 *
 * Document handling at the winning candidate:
 *   - empty document           -> empty map
 *   - top level not a mapping  -> warning, empty map
 *   - YAML syntax error        -> ConfigParseError (the build aborts)
 *
 * No candidate at all is not an error: the module gets an empty map.
 */

import { join } from 'node:path';
import type { ConfigSearchContext, ConfigurationMap, Logger } from '@stepwise/kernel';
import { isYamlMapping, parseYamlDocument, readTextIfReadable } from '@stepwise/runtime-host';

export interface ResolvedConfiguration {
  /** The candidate that was parsed, or null when none existed. */
  readonly path: string | null;
  readonly configurationMap: ConfigurationMap;
}

/**
 * Yield the candidate paths for a configuration file in precedence order.
 *
 * Lazy: the resolver stops pulling as soon as a candidate is found.
 */
export function* configCandidates(
  context: ConfigSearchContext,
  moduleName: string,
  configFileName: string,
): Generator<string, void, undefined> {
  if (context.appDataDirOverridden) {
    yield join(context.appDataDir, 'modules', configFileName);
    return;
  }
  if (context.debugMode) {
    yield join(context.currentDir, 'src', 'modules', moduleName, configFileName);
  }
  yield join(context.systemConfigDir, configFileName);
  yield join(context.appDataDir, 'modules', configFileName);
}

/**
 * Resolve a module's configuration.
 *
 * @param context - Search roots and debug flag
 * @param moduleName - Used for the debug-mode source checkout path
 * @param configFileName - Bare file name, e.g. `welcome.conf`
 * @param logger - Receives the shape warning and candidate tracing
 * @throws {ConfigParseError} If the first readable candidate is not valid YAML
 */
export function resolveConfiguration(
  context: ConfigSearchContext,
  moduleName: string,
  configFileName: string,
  logger: Logger,
): ResolvedConfiguration {
  for (const path of configCandidates(context, moduleName, configFileName)) {
    const text = readTextIfReadable(path);
    if (text === null) {
      logger.debug('Configuration candidate not found', { module: moduleName, path });
      continue;
    }

    logger.debug('Using configuration file', { module: moduleName, path });
    const doc = parseYamlDocument(text, path);
    if (doc === null) {
      // An empty file is valid; it just configures nothing.
      return { path, configurationMap: {} };
    }
    if (!isYamlMapping(doc)) {
      logger.warn('Bad module configuration format', { module: moduleName, path });
      return { path, configurationMap: {} };
    }
    return { path, configurationMap: doc };
  }

  return { path: null, configurationMap: {} };
}
