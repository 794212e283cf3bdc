/**
 * Stepwise Runtime Host - module.desc Reader
 *
 * Every module directory carries a `module.desc` YAML file:
 *
 *   ---
 *   type:      "job"        # job or view
 *   name:      "unpackfs"   # unique, same as the parent directory
 *   interface: "python"     # qtplugin, python, process, pythonqt
 *
 * This reader only checks that the file is a YAML mapping. Field validation
 * belongs to the module factory.
 */

import { basename, join, resolve } from 'node:path';
import type { ModuleDescriptor } from '@stepwise/kernel';
import { ConfigParseError, DescriptorReadError } from '@stepwise/kernel';
import { readTextIfReadable } from '../fs/readable.js';
import { isYamlMapping, parseYamlDocument } from '../yaml/document.js';

export const DESCRIPTOR_FILENAME = 'module.desc';

/**
 * Read and parse `<moduleDirectory>/module.desc`.
 *
 * When the descriptor has no usable `name`, the base name of the resolved
 * directory is used instead, so `.` names the module after the working
 * directory.
 *
 * @throws {DescriptorReadError} If the file is missing, unreadable, not valid
 *   YAML, or its top level is not a mapping
 */
export function readModuleDescriptor(moduleDirectory: string): ModuleDescriptor {
  const path = join(moduleDirectory, DESCRIPTOR_FILENAME);
  const text = readTextIfReadable(path);
  if (text === null) {
    throw new DescriptorReadError(path, 'file is missing or not readable');
  }

  let doc: unknown;
  try {
    doc = parseYamlDocument(text, path);
  } catch (err: unknown) {
    if (err instanceof ConfigParseError) {
      throw new DescriptorReadError(path, err.detail, { cause: err });
    }
    throw err;
  }

  if (!isYamlMapping(doc)) {
    throw new DescriptorReadError(path, 'top level is not a mapping');
  }

  const name = doc['name'];
  if (typeof name === 'string' && name !== '') {
    return doc;
  }
  return { ...doc, name: basename(resolve(moduleDirectory)) };
}
