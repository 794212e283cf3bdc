/**
 * Stepwise Module Loader - ModuleLoader Tests
 *
 *   LD1: loads a module directory, defaulting instance id and config file name
 *   LD2: explicit instance id and config file name are honoured
 *   LD3: a missing module.desc is returned as a DescriptorReadError and logged
 *   LD4: factory failures are passed through unchanged
 *   LD5: a relative directory takes its name from the resolved path
 */

import { afterEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { BuildErrorCode, DescriptorReadError, Logger, ModuleBuildError } from '@stepwise/kernel';
import { MemoryLogSink } from '@stepwise/runtime-host';
import { ModuleFactory } from '../src/factory.js';
import { ModuleLoader } from '../src/loader.js';
import { ProcessJobModule } from '../src/variants/job-modules.js';
import { createSandbox } from './fixtures.js';

describe('ModuleLoader', () => {
  const startDir = process.cwd();

  afterEach(() => {
    process.chdir(startDir);
  });

  it('LD1: loads a module directory with default instance id and config name', () => {
    const sb = createSandbox();
    const dir = sb.moduleDir('shellprocess');
    sb.write(join(dir, 'module.desc'), 'type: job\ninterface: process\ncommand: "true"\n');
    sb.write(join(sb.appDataDir, 'modules', 'shellprocess.conf'), 'dontChroot: true\n');

    const loader = new ModuleLoader(new ModuleFactory({ context: sb.context() }));
    const result = loader.load({ directory: dir });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.module).toBeInstanceOf(ProcessJobModule);
    expect(result.module.name).toBe('shellprocess');
    expect(result.module.instanceKey).toBe('shellprocess@shellprocess');
    expect(result.module.configurationMap).toEqual({ dontChroot: true });
  });

  it('LD2: honours an explicit instance id and configuration file name', () => {
    const sb = createSandbox();
    const dir = sb.moduleDir('shellprocess');
    sb.write(join(dir, 'module.desc'), 'type: job\nname: shellprocess\ninterface: process\n');
    sb.write(join(sb.appDataDir, 'modules', 'shellprocess-before.conf'), 'script: ["echo before"]\n');

    const loader = new ModuleLoader(new ModuleFactory({ context: sb.context() }));
    const result = loader.load({
      directory: dir,
      instanceId: 'before',
      configFileName: 'shellprocess-before.conf',
    });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.module.instanceKey).toBe('shellprocess@before');
    expect(result.module.configurationMap).toEqual({ script: ['echo before'] });
  });

  it('LD3: a directory without module.desc is a DescriptorReadError', () => {
    const sb = createSandbox();
    const sink = new MemoryLogSink();
    const dir = sb.moduleDir('empty');

    const loader = new ModuleLoader(new ModuleFactory({ context: sb.context() }), new Logger(sink));
    const result = loader.load({ directory: dir });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DescriptorReadError);
    expect(sink.list().map((e) => e.context)).toEqual([{ path: join(dir, 'module.desc') }]);
  });

  it('LD4: passes factory failures through', () => {
    const sb = createSandbox();
    const dir = sb.moduleDir('broken');
    sb.write(join(dir, 'module.desc'), 'type: view\ninterface: process\n');

    const loader = new ModuleLoader(new ModuleFactory({ context: sb.context() }));
    const result = loader.load({ directory: dir });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ModuleBuildError);
    expect(result.error instanceof ModuleBuildError && result.error.code).toBe(
      BuildErrorCode.UnsupportedInterface,
    );
    expect(result.error instanceof ModuleBuildError && result.error.instanceId).toBe('broken');
  });

  it('LD5: loading "." from inside a module directory uses that directory name', () => {
    const sb = createSandbox();
    const dir = sb.moduleDir('welcome');
    sb.write(join(dir, 'module.desc'), 'type: view\ninterface: qtplugin\n');
    sb.write(join(sb.appDataDir, 'modules', 'welcome.conf'), 'showSupportUrl: true\n');
    process.chdir(dir);

    const loader = new ModuleLoader(new ModuleFactory({ context: sb.context() }));
    const result = loader.load({ directory: '.' });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.module.name).toBe('welcome');
    expect(result.module.instanceKey).toBe('welcome@welcome');
    expect(result.module.configurationMap).toEqual({ showSupportUrl: true });
  });
});
