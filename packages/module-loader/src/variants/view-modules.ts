/**
 * Stepwise Module Loader - View Module Variants
 *
 * Views present a user-facing step. Driving the UI is not part of
 * construction; the variants only keep what their runner will need.
 */

import type { ModuleDescriptor } from '@stepwise/kernel';
import { ModuleInterface, ModuleKind } from '@stepwise/kernel';
import { Module } from '../module.js';
import { descriptorString } from '../descriptor-values.js';
import { DEFAULT_SCRIPT_FILENAME } from './job-modules.js';

/**
 * A view implemented as a native UI plugin.
 */
export class ViewModule extends Module {
  readonly kind = ModuleKind.View;
  readonly moduleInterface = ModuleInterface.QtPluginInterface;

  private _pluginFile: string | null = null;

  get pluginFile(): string | null {
    return this._pluginFile;
  }

  protected initVariant(descriptor: ModuleDescriptor): void {
    const load = descriptorString(descriptor['load']);
    this._pluginFile = load === '' ? null : load;
  }
}

/**
 * A view implemented as a script driving the UI through the scripting-UI
 * backend.
 */
export class PythonQtViewModule extends Module {
  readonly kind = ModuleKind.View;
  readonly moduleInterface = ModuleInterface.PythonQtInterface;

  private _scriptFileName = DEFAULT_SCRIPT_FILENAME;

  get scriptFileName(): string {
    return this._scriptFileName;
  }

  protected initVariant(descriptor: ModuleDescriptor): void {
    const script = descriptorString(descriptor['script']);
    this._scriptFileName = script === '' ? DEFAULT_SCRIPT_FILENAME : script;
  }
}
