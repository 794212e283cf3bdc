/**
 * Stepwise Kernel - Error Types
 *
 * Every failure that aborts a module build is a ModuleBuildError carrying a
 * BuildErrorCode and the instance id being built. Lower layers throw the more
 * specific ConfigParseError / DescriptorReadError; the factory and loader wrap
 * them before reporting to the caller.
 */

// ---------------------------------------------------------------------------
// Build Error Codes
// ---------------------------------------------------------------------------

export enum BuildErrorCode {
  /** `type` or `interface` missing or empty, or `type` not recognised. */
  InvalidDescriptor = 'InvalidDescriptor',
  /** Recognised kind, but the interface is unknown for it or its backend is absent. */
  UnsupportedInterface = 'UnsupportedInterface',
  /** Module directory missing or unreadable. */
  InvalidDirectory = 'InvalidDirectory',
  /** The winning configuration file is not valid YAML. */
  ConfigParseError = 'ConfigParseError',
}

// ---------------------------------------------------------------------------
// ModuleBuildError
// ---------------------------------------------------------------------------

/**
 * A module could not be built. No partial module accompanies this error.
 */
export class ModuleBuildError extends Error {
  constructor(
    readonly code: BuildErrorCode,
    readonly instanceId: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ModuleBuildError';
  }
}

// ---------------------------------------------------------------------------
// ConfigParseError
// ---------------------------------------------------------------------------

/**
 * A configuration file exists and is readable but does not parse as YAML.
 */
export class ConfigParseError extends Error {
  constructor(
    readonly path: string,
    readonly detail: string,
    options?: ErrorOptions,
  ) {
    super(`YAML parser error in ${path}: ${detail}`, options);
    this.name = 'ConfigParseError';
  }
}

// ---------------------------------------------------------------------------
// DescriptorReadError
// ---------------------------------------------------------------------------

/**
 * A `module.desc` file is missing, unreadable, malformed or not a mapping.
 */
export class DescriptorReadError extends Error {
  constructor(
    readonly path: string,
    readonly detail: string,
    options?: ErrorOptions,
  ) {
    super(`Bad module descriptor ${path}: ${detail}`, options);
    this.name = 'DescriptorReadError';
  }
}
