/**
 * Stepwise Module Loader - Module Factory
 *
 * Builds a Module from its descriptor. The build is all-or-nothing: either a
 * fully initialised module is returned, or a ModuleBuildError and no module.
 *
 * Build steps:
 * 1. Validate that `type` and `interface` are present (InvalidDescriptor)
 * 2. Select the variant for the exact (type, interface) pair
 *    (InvalidDescriptor for an unknown type, UnsupportedInterface otherwise)
 * 3. Check the module directory exists and is readable (InvalidDirectory)
 * 4. Bind instance id and absolute directory
 * 5. Copy descriptor fields
 * 6. Resolve the layered configuration file (ConfigParseError)
 *
 * Every failure is logged at error level before it is returned.
 */

import { resolve } from 'node:path';
import type {
  BackendSupport,
  ConfigSearchContext,
  ModuleDescriptor,
} from '@stepwise/kernel';
import {
  BuildErrorCode,
  ConfigParseError,
  DEFAULT_BACKEND_SUPPORT,
  Logger,
  ModuleBuildError,
  ModuleInterface,
  ModuleKind,
} from '@stepwise/kernel';
import { isReadableDirectory } from '@stepwise/runtime-host';
import type { Module } from './module.js';
import { ModuleValidator } from './validator.js';
import { CppJobModule, ProcessJobModule, PythonJobModule } from './variants/job-modules.js';
import { PythonQtViewModule, ViewModule } from './variants/view-modules.js';

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/**
 * The result of a module build.
 * A discriminated union: either the module, or the reason it was not built.
 */
export type BuildResult =
  | { readonly ok: true; readonly module: Module }
  | { readonly ok: false; readonly error: ModuleBuildError };

/**
 * The outcome of looking up a (type, interface) pair.
 */
export type VariantSelection =
  | {
      readonly ok: true;
      readonly kind: ModuleKind;
      readonly moduleInterface: ModuleInterface;
      readonly create: () => Module;
    }
  | { readonly ok: false; readonly code: BuildErrorCode; readonly reason: string };

// ---------------------------------------------------------------------------
// Variant table
// ---------------------------------------------------------------------------

const KIND_BY_TYPE: ReadonlyMap<string, ModuleKind> = new Map([
  ['job', ModuleKind.Job],
  ['view', ModuleKind.View],
  ['viewmodule', ModuleKind.View],
]);

const INTERFACE_BY_NAME: ReadonlyMap<string, ModuleInterface> = new Map([
  ['qtplugin', ModuleInterface.QtPluginInterface],
  ['process', ModuleInterface.ProcessInterface],
  ['python', ModuleInterface.PythonInterface],
  ['pythonqt', ModuleInterface.PythonQtInterface],
]);

/**
 * Select the module variant for a descriptor's `type` and `interface`.
 *
 * Matching is exact and case-sensitive. `view` and `viewmodule` both mean a
 * View. Variants whose backend is absent from `backends` are rejected as
 * UnsupportedInterface, the same as an interface the kind does not offer.
 */
export function selectVariant(
  typeString: string,
  interfaceString: string,
  backends: BackendSupport,
): VariantSelection {
  const kind = KIND_BY_TYPE.get(typeString);
  if (kind === undefined) {
    return {
      ok: false,
      code: BuildErrorCode.InvalidDescriptor,
      reason: `Bad module type ${typeString}`,
    };
  }

  const badInterface: VariantSelection = {
    ok: false,
    code: BuildErrorCode.UnsupportedInterface,
    reason: `Bad interface ${interfaceString} for module type ${typeString}`,
  };
  const moduleInterface = INTERFACE_BY_NAME.get(interfaceString);
  if (moduleInterface === undefined) {
    return badInterface;
  }

  const select = (create: () => Module): VariantSelection => ({
    ok: true,
    kind,
    moduleInterface,
    create,
  });

  switch (kind) {
    case ModuleKind.View:
      switch (moduleInterface) {
        case ModuleInterface.QtPluginInterface:
          return select(() => new ViewModule());
        case ModuleInterface.PythonQtInterface:
          return backends.pythonQt
            ? select(() => new PythonQtViewModule())
            : {
                ok: false,
                code: BuildErrorCode.UnsupportedInterface,
                reason: 'PythonQt view modules are not supported in this build',
              };
        default:
          return badInterface;
      }
    case ModuleKind.Job:
      switch (moduleInterface) {
        case ModuleInterface.QtPluginInterface:
          return select(() => new CppJobModule());
        case ModuleInterface.ProcessInterface:
          return select(() => new ProcessJobModule());
        case ModuleInterface.PythonInterface:
          return backends.python
            ? select(() => new PythonJobModule())
            : {
                ok: false,
                code: BuildErrorCode.UnsupportedInterface,
                reason: 'Python modules are not supported in this build',
              };
        default:
          return badInterface;
      }
  }
}

// ---------------------------------------------------------------------------
// Module Factory
// ---------------------------------------------------------------------------

export interface ModuleFactoryOptions {
  /** Where configuration files are searched for. */
  readonly context: ConfigSearchContext;
  /** Optional backends available to this build. Default: DEFAULT_BACKEND_SUPPORT. */
  readonly backends?: BackendSupport | undefined;
  /** Default: a Logger with no sink. */
  readonly logger?: Logger | undefined;
}

export class ModuleFactory {
  private readonly validator = new ModuleValidator();
  private readonly context: ConfigSearchContext;
  private readonly backends: BackendSupport;
  private readonly logger: Logger;

  constructor(opts: ModuleFactoryOptions) {
    this.context = opts.context;
    this.backends = opts.backends ?? DEFAULT_BACKEND_SUPPORT;
    this.logger = opts.logger ?? new Logger();
  }

  /**
   * Build a module from its descriptor.
   *
   * @param descriptor - Raw descriptor mapping (read-only)
   * @param instanceId - Caller-chosen instance id, used verbatim
   * @param configFileName - Bare configuration file name, e.g. `welcome.conf`
   * @param moduleDirectory - Module directory; resolved to an absolute path
   */
  build(
    descriptor: ModuleDescriptor,
    instanceId: string,
    configFileName: string,
    moduleDirectory: string,
  ): BuildResult {
    // Step 1: required fields
    const shape = this.validator.validateDescriptor(descriptor, instanceId);
    if (!shape.ok) {
      const details = shape.errors.map((e) => e.message).join('; ');
      return this.fail(
        BuildErrorCode.InvalidDescriptor,
        instanceId,
        `Bad module descriptor format for ${instanceId}: ${details}`,
      );
    }
    const { typeString, interfaceString } = shape.value;

    // Step 2: variant lookup
    const selection = selectVariant(typeString, interfaceString, this.backends);
    if (!selection.ok) {
      this.logger.error(selection.reason, { instance: instanceId });
      return this.fail(
        selection.code,
        instanceId,
        `Bad module type (${typeString}) or interface string (${interfaceString}) ` +
          `for module ${instanceId}: ${selection.reason}`,
      );
    }

    // Step 3: directory
    const directory = resolve(moduleDirectory);
    if (!isReadableDirectory(directory)) {
      return this.fail(
        BuildErrorCode.InvalidDirectory,
        instanceId,
        `Bad module directory ${moduleDirectory} for ${instanceId}`,
      );
    }

    // Steps 4-5: identity and descriptor fields
    const module = selection.create();
    module.bindLocation(instanceId, directory);
    module.initFrom(descriptor);

    // Step 6: configuration; a parse failure discards the module
    try {
      module.loadConfigurationFile(configFileName, this.context, this.logger);
    } catch (err: unknown) {
      if (err instanceof ConfigParseError) {
        return this.fail(
          BuildErrorCode.ConfigParseError,
          instanceId,
          `YAML parser error for ${instanceId}: ${err.message}`,
          err,
        );
      }
      throw err;
    }

    this.logger.debug('Module built', {
      instance: module.instanceKey,
      type: module.typeString(),
      interface: module.interfaceString(),
      config: module.configurationPath,
    });
    return { ok: true, module };
  }

  private fail(
    code: BuildErrorCode,
    instanceId: string,
    message: string,
    cause?: unknown,
  ): BuildResult {
    this.logger.error(message, { instance: instanceId, code });
    const error =
      cause === undefined
        ? new ModuleBuildError(code, instanceId, message)
        : new ModuleBuildError(code, instanceId, message, { cause });
    return { ok: false, error };
  }
}
