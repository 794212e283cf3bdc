/**
 * Stepwise Module Loader - Module Loader
 *
 * The ModuleLoader turns a module directory into a built Module.
 *
 * Loading is a two-step process:
 * 1. Read `<directory>/module.desc` (readModuleDescriptor)
 * 2. Build the module through ModuleFactory.build()
 *
 * Failures are returned, never thrown, so a caller loading many modules can
 * skip the broken ones and carry on.
 */

import type { Logger, ModuleBuildError, ModuleDescriptor } from '@stepwise/kernel';
import { DescriptorReadError } from '@stepwise/kernel';
import { readModuleDescriptor } from '@stepwise/runtime-host';
import type { ModuleFactory } from './factory.js';
import type { Module } from './module.js';
import { descriptorString } from './descriptor-values.js';

// ---------------------------------------------------------------------------
// Load Request / Result
// ---------------------------------------------------------------------------

export interface LoadRequest {
  /** Module directory containing module.desc. */
  readonly directory: string;
  /** Instance id. Default: the module name. */
  readonly instanceId?: string | undefined;
  /** Configuration file name. Default: `<module name>.conf`. */
  readonly configFileName?: string | undefined;
}

/**
 * The result of a module load attempt.
 * A discriminated union: either the module, or the error that stopped it.
 */
export type LoadResult =
  | { readonly ok: true; readonly module: Module }
  | { readonly ok: false; readonly error: ModuleBuildError | DescriptorReadError };

// ---------------------------------------------------------------------------
// Module Loader
// ---------------------------------------------------------------------------

export class ModuleLoader {
  constructor(
    private readonly factory: ModuleFactory,
    private readonly logger?: Logger,
  ) {}

  /**
   * Load the module in `request.directory`.
   *
   * @returns LoadResult - the module on success, the failure otherwise
   */
  load(request: LoadRequest): LoadResult {
    let descriptor: ModuleDescriptor;
    try {
      descriptor = readModuleDescriptor(request.directory);
    } catch (err: unknown) {
      if (err instanceof DescriptorReadError) {
        this.logger?.error(err.message, { path: err.path });
        return { ok: false, error: err };
      }
      throw err;
    }

    // readModuleDescriptor guarantees a non-empty name.
    const name = descriptorString(descriptor['name']);
    const instanceId = request.instanceId ?? name;
    const configFileName = request.configFileName ?? `${name}.conf`;

    return this.factory.build(descriptor, instanceId, configFileName, request.directory);
  }
}
