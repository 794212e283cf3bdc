/**
 * Stepwise Runtime Host - module.desc Reader Tests
 *
 *   D1: reads a mapping descriptor verbatim
 *   D2: falls back to the directory name when `name` is absent
 *   D3: missing module.desc is a DescriptorReadError
 *   D4: invalid YAML is a DescriptorReadError
 *   D5: a non-mapping top level is a DescriptorReadError
 *   D6: a relative directory falls back to the resolved directory name
 */

import { afterEach, describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DescriptorReadError } from '@stepwise/kernel';
import { readModuleDescriptor } from '../src/descriptor/module-desc.js';

function moduleDir(name: string, descriptor?: string): string {
  const root = mkdtempSync(join(tmpdir(), 'stepwise-desc-'));
  const dir = join(root, name);
  mkdirSync(dir);
  if (descriptor !== undefined) {
    writeFileSync(join(dir, 'module.desc'), descriptor);
  }
  return dir;
}

describe('readModuleDescriptor', () => {
  const startDir = process.cwd();

  afterEach(() => {
    process.chdir(startDir);
  });

  it('D1: reads a mapping descriptor verbatim', () => {
    const dir = moduleDir('shellprocess', '---\ntype: "job"\nname: "shellprocess"\ninterface: "process"\ncommand: "echo hi"\n');

    expect(readModuleDescriptor(dir)).toEqual({
      type: 'job',
      name: 'shellprocess',
      interface: 'process',
      command: 'echo hi',
    });
  });

  it('D2: falls back to the directory name when name is absent', () => {
    const dir = moduleDir('welcome', 'type: view\ninterface: qtplugin\n');

    expect(readModuleDescriptor(dir)).toEqual({
      type: 'view',
      interface: 'qtplugin',
      name: 'welcome',
    });
  });

  it('D3: a missing module.desc is a DescriptorReadError', () => {
    const dir = moduleDir('empty');
    expect(() => readModuleDescriptor(dir)).toThrow(DescriptorReadError);
  });

  it('D4: invalid YAML is a DescriptorReadError naming the file', () => {
    const dir = moduleDir('broken', 'type: [job\n');

    let caught: unknown;
    try {
      readModuleDescriptor(dir);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DescriptorReadError);
    expect(caught instanceof DescriptorReadError && caught.path).toBe(join(dir, 'module.desc'));
  });

  it('D5: a list at the top level is a DescriptorReadError', () => {
    const dir = moduleDir('listy', '- job\n- process\n');
    expect(() => readModuleDescriptor(dir)).toThrow('top level is not a mapping');
  });

  it('D6: "." is named after the working directory', () => {
    const dir = moduleDir('welcome', 'type: view\ninterface: qtplugin\n');
    process.chdir(dir);

    expect(readModuleDescriptor('.')['name']).toBe('welcome');
    expect(readModuleDescriptor(join('..', 'welcome', '.'))['name']).toBe('welcome');
  });
});
