/**
 * @stepwise/cli
 *
 * Stepwise operator command-line interface.
 *
 * Usage:
 *   stepwise --help
 *   stepwise inspect <module-dir> [--instance <id>] [--config <file>]
 *                                 [--app-data <dir>] [--debug] [--json]
 */

export { program } from './commands/index.js';
export { backendsFromOptions, inspectCommand } from './commands/inspect.js';
export { ConsoleLogSink, FanOutLogSink, formatLogLine } from './logging/console-log-sink.js';
export type { ModuleSummary } from './output/module-summary.js';
export { renderModuleSummary, summarizeModule } from './output/module-summary.js';
