/**
 * Stepwise Module Loader - Module Registry
 *
 * The ModuleRegistry is the record of all built module instances, keyed by
 * instance key (`name@instanceId`).
 *
 * Registry invariants:
 * - An instance key is registered at most once
 * - Modules are listed in registration order
 */

import type { Module } from './module.js';

export class ModuleRegistry {
  private readonly entries: Map<string, Module> = new Map();

  /**
   * Register a built module.
   *
   * @throws {Error} If a module with the same instance key is already registered
   */
  register(module: Module): void {
    if (this.entries.has(module.instanceKey)) {
      throw new Error(
        `Module instance already registered: ${module.instanceKey}. ` +
          `Give the second instance a different instance id.`,
      );
    }
    this.entries.set(module.instanceKey, module);
  }

  /**
   * @returns The module registered under `instanceKey`, or undefined
   */
  get(instanceKey: string): Module | undefined {
    return this.entries.get(instanceKey);
  }

  has(instanceKey: string): boolean {
    return this.entries.has(instanceKey);
  }

  /** All registered modules, in registration order. */
  list(): ReadonlyArray<Module> {
    return Array.from(this.entries.values());
  }

  /** Registered modules with the emergency flag set. */
  listEmergency(): ReadonlyArray<Module> {
    return this.list().filter((m) => m.emergency);
  }

  /**
   * Required module names of `instanceKey` that have no registered instance.
   *
   * @throws {Error} If `instanceKey` is not registered
   */
  missingRequirements(instanceKey: string): ReadonlyArray<string> {
    const module = this.entries.get(instanceKey);
    if (module === undefined) {
      throw new Error(`Module instance not registered: ${instanceKey}`);
    }
    const names = new Set(this.list().map((m) => m.name));
    return module.requiredModules.filter((required) => !names.has(required));
  }
}
