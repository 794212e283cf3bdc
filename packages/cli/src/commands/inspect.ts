/**
 * stepwise inspect - Build one module and show what was resolved
 *
 * Reads <module-dir>/module.desc, builds the module exactly as the installer
 * would, and prints its identity, kind, interface, emergency flag and the
 * configuration file that won. A failed build prints the failure to stderr
 * and sets exit code 1.
 */

import { Command } from 'commander';
import type { BackendSupport, LogSink } from '@stepwise/kernel';
import { DEFAULT_BACKEND_SUPPORT, Logger } from '@stepwise/kernel';
import { ModuleFactory, ModuleLoader } from '@stepwise/module-loader';
import { FileLogSink, resolveSearchContext } from '@stepwise/runtime-host';
import { ConsoleLogSink, FanOutLogSink } from '../logging/console-log-sink.js';
import { renderModuleSummary, summarizeModule } from '../output/module-summary.js';
import { t } from '../output/theme.js';

interface InspectOptions {
  instance?: string;
  config?: string;
  appData?: string;
  debug?: boolean;
  withPythonqt?: boolean;
  withoutPython?: boolean;
  logFile?: string;
  json?: boolean;
}

export function backendsFromOptions(options: InspectOptions): BackendSupport {
  return {
    python: options.withoutPython === true ? false : DEFAULT_BACKEND_SUPPORT.python,
    pythonQt: options.withPythonqt === true ? true : DEFAULT_BACKEND_SUPPORT.pythonQt,
  };
}

export const inspectCommand = new Command('inspect')
  .description('Build the module in a directory and show its resolved configuration')
  .argument('<module-dir>', 'Module directory containing module.desc')
  .option('--instance <id>', 'Instance id (default: the module name)')
  .option('--config <file>', 'Configuration file name (default: <name>.conf)')
  .option('--app-data <dir>', 'Override the application data root (only root searched)')
  .option('--debug', 'Also search ./src/modules/<name>/ and log every candidate')
  .option('--with-pythonqt', 'Enable scripting view modules')
  .option('--without-python', 'Disable scripting job modules')
  .option('--log-file <path>', 'Also append log entries as JSONL to this file')
  .option('--json', 'Output as JSON')
  .action((moduleDir: string, options: InspectOptions) => {
    const sinks: LogSink[] = [new ConsoleLogSink()];
    if (options.logFile !== undefined) {
      sinks.push(new FileLogSink(options.logFile));
    }
    const logger = new Logger(new FanOutLogSink(...sinks), {
      minLevel: options.debug === true ? 'debug' : 'warn',
    });

    const context = resolveSearchContext({ appDataDir: options.appData, debug: options.debug });
    const factory = new ModuleFactory({ context, backends: backendsFromOptions(options), logger });
    const loader = new ModuleLoader(factory, logger);

    const result = loader.load({
      directory: moduleDir,
      instanceId: options.instance,
      configFileName: options.config,
    });

    if (!result.ok) {
      process.stderr.write(`${t.red('Module not built:')} ${result.error.message}\n`);
      process.exitCode = 1;
      return;
    }

    const summary = summarizeModule(result.module);
    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(summary, null, 2));
      return;
    }
    process.stdout.write(renderModuleSummary(summary));
  });
