/**
 * @stepwise/runtime-host
 *
 * Stepwise runtime host - side-effectful helpers: filesystem readability
 * probes, YAML document parsing, module.desc reading, search context
 * resolution and log sinks. Depends on @stepwise/kernel for types; implements
 * concrete behaviour with Node.js built-ins and the `yaml` package.
 *
 * No kernel code imports from this package.
 */

// Filesystem probes
export { isNodeError, isReadableDirectory, readTextIfReadable } from './fs/readable.js';

// YAML
export { isYamlMapping, parseYamlDocument } from './yaml/document.js';

// module.desc
export { DESCRIPTOR_FILENAME, readModuleDescriptor } from './descriptor/module-desc.js';

// Search context (application data root, debug mode, admin directory)
export type { ResolveSearchContextOptions } from './search-context.js';
export { DATA_DIR_ENV, DEBUG_ENV, resolveSearchContext } from './search-context.js';

// Logging
export { FileLogSink } from './logging/file-log-sink.js';
export { MemoryLogSink } from './logging/memory-log-sink.js';
