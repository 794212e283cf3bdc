/**
 * @stepwise/kernel
 *
 * Stepwise kernel - module kinds and interfaces, descriptor and configuration
 * types, error types, and the logging contract.
 *
 * This package is side-effect free. It contains no imports of node:fs or any
 * other I/O API. Filesystem access, YAML parsing and log sinks live in
 * @stepwise/runtime-host.
 */

// Types
export type {
  BackendSupport,
  ConfigurationMap,
  ModuleDescriptor,
} from './types/module.js';
export {
  DEFAULT_BACKEND_SUPPORT,
  EMERGENCY_KEY,
  ModuleInterface,
  ModuleKind,
} from './types/module.js';

export type { ConfigSearchContext } from './types/config.js';
export { DEFAULT_APP_DATA_DIR, SYSTEM_MODULES_CONFIG_DIR } from './types/config.js';

export type { ValidationError, ValidationResult } from './types/validation.js';

// Errors
export {
  BuildErrorCode,
  ConfigParseError,
  DescriptorReadError,
  ModuleBuildError,
} from './errors.js';

// Logging (sink implementations live in runtime-host and cli)
export type { LogEntry, LogLevel, LogSink } from './logging/log-sink.js';
export { LOG_LEVEL_ORDER } from './logging/log-sink.js';
export type { LoggerOptions } from './logging/logger.js';
export { Logger } from './logging/logger.js';
