/**
 * Stepwise Module Loader - Job Module Variants
 *
 * Jobs perform state-changing work. Each variant records the descriptor keys
 * its runner needs; running them is not part of construction, so none of
 * these keys is validated here.
 */

import type { ModuleDescriptor } from '@stepwise/kernel';
import { ModuleInterface, ModuleKind } from '@stepwise/kernel';
import { Module } from '../module.js';
import { descriptorFlag, descriptorNumber, descriptorString } from '../descriptor-values.js';

/** Seconds a process job may run when the descriptor sets no `timeout`. */
export const DEFAULT_PROCESS_TIMEOUT_SECONDS = 10;

/** Script run by scripting modules when the descriptor names none. */
export const DEFAULT_SCRIPT_FILENAME = 'main.py';

/**
 * A job implemented as a native plugin library.
 */
export class CppJobModule extends Module {
  readonly kind = ModuleKind.Job;
  readonly moduleInterface = ModuleInterface.QtPluginInterface;

  private _pluginFile: string | null = null;

  /** The `load` key: plugin library file name, or null to use the default. */
  get pluginFile(): string | null {
    return this._pluginFile;
  }

  protected initVariant(descriptor: ModuleDescriptor): void {
    const load = descriptorString(descriptor['load']);
    this._pluginFile = load === '' ? null : load;
  }
}

/**
 * A job that runs an external command.
 */
export class ProcessJobModule extends Module {
  readonly kind = ModuleKind.Job;
  readonly moduleInterface = ModuleInterface.ProcessInterface;

  private _command = '';
  private _timeoutSeconds = DEFAULT_PROCESS_TIMEOUT_SECONDS;
  private _runInChroot = false;

  get command(): string {
    return this._command;
  }

  get timeoutSeconds(): number {
    return this._timeoutSeconds;
  }

  /** Run inside the target system rather than the live host. */
  get runInChroot(): boolean {
    return this._runInChroot;
  }

  protected initVariant(descriptor: ModuleDescriptor): void {
    this._command = descriptorString(descriptor['command']);
    this._timeoutSeconds = descriptorNumber(descriptor['timeout'], DEFAULT_PROCESS_TIMEOUT_SECONDS);
    this._runInChroot = descriptorFlag(descriptor['chroot']);
  }
}

/**
 * A job implemented as a script run by the embedded scripting backend.
 */
export class PythonJobModule extends Module {
  readonly kind = ModuleKind.Job;
  readonly moduleInterface = ModuleInterface.PythonInterface;

  private _scriptFileName = DEFAULT_SCRIPT_FILENAME;

  get scriptFileName(): string {
    return this._scriptFileName;
  }

  protected initVariant(descriptor: ModuleDescriptor): void {
    const script = descriptorString(descriptor['script']);
    this._scriptFileName = script === '' ? DEFAULT_SCRIPT_FILENAME : script;
  }
}
