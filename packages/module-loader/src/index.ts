/**
 * @stepwise/module-loader
 *
 * Stepwise module loader - module variants, the descriptor-driven factory,
 * the layered configuration resolver, the directory loader and the module
 * registry.
 */

export { Module } from './module.js';
export {
  CppJobModule,
  DEFAULT_PROCESS_TIMEOUT_SECONDS,
  DEFAULT_SCRIPT_FILENAME,
  ProcessJobModule,
  PythonJobModule,
} from './variants/job-modules.js';
export { PythonQtViewModule, ViewModule } from './variants/view-modules.js';

export type { BuildResult, ModuleFactoryOptions, VariantSelection } from './factory.js';
export { ModuleFactory, selectVariant } from './factory.js';

export type { ResolvedConfiguration } from './config-resolver.js';
export { configCandidates, resolveConfiguration } from './config-resolver.js';

export type { DescriptorShape } from './validator.js';
export { ModuleValidator } from './validator.js';

export type { LoadRequest, LoadResult } from './loader.js';
export { ModuleLoader } from './loader.js';

export { ModuleRegistry } from './registry.js';
