/**
 * Stepwise CLI - Module Summary
 *
 * A plain, serialisable view of a built module for `--json` output, and its
 * human-readable rendering.
 */

import type { ConfigurationMap } from '@stepwise/kernel';
import type { Module } from '@stepwise/module-loader';
import { t } from './theme.js';

export interface ModuleSummary {
  readonly instance_key: string;
  readonly name: string;
  readonly instance_id: string;
  readonly type: string;
  readonly interface: string;
  readonly directory: string;
  readonly required_modules: ReadonlyArray<string>;
  readonly emergency: boolean;
  readonly configuration_path: string | null;
  readonly configuration: ConfigurationMap;
}

export function summarizeModule(module: Module): ModuleSummary {
  return {
    instance_key: module.instanceKey,
    name: module.name,
    instance_id: module.instanceId,
    type: module.typeString(),
    interface: module.interfaceString(),
    directory: module.directory,
    required_modules: module.requiredModules,
    emergency: module.emergency,
    configuration_path: module.configurationPath,
    configuration: module.configurationMap,
  };
}

export function renderModuleSummary(summary: ModuleSummary): string {
  const row = (label: string, value: string) => `  ${t.muted(label.padEnd(12))}${value}\n`;

  let out = `\n${t.dim('─── ')}${t.blue(summary.instance_key)}\n`;
  out += row('type', t.white(summary.type));
  out += row('interface', t.white(summary.interface));
  out += row('directory', t.text(summary.directory));
  out += row(
    'requires',
    summary.required_modules.length === 0 ? t.dim('(none)') : summary.required_modules.join(', '),
  );
  out += row('emergency', summary.emergency ? t.amber('yes') : t.dim('no'));
  out += row('config', summary.configuration_path ?? t.dim('(none found)'));

  const keys = Object.keys(summary.configuration);
  if (keys.length > 0) {
    out += '\n';
    for (const key of keys) {
      out += `    ${t.white(key)}: ${JSON.stringify(summary.configuration[key])}\n`;
    }
  }
  return out;
}
