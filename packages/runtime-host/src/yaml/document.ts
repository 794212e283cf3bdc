/**
 * Stepwise Runtime Host - YAML Documents
 *
 * Thin wrapper over the `yaml` package for module descriptors and module
 * configuration files. Only the first document of a stream is read; later
 * documents are ignored. Repeated mapping keys are accepted and the last one
 * wins. A syntax error in the first document is raised as a ConfigParseError
 * naming the file. An empty document parses to null.
 */

import { parseAllDocuments } from 'yaml';
import { ConfigParseError } from '@stepwise/kernel';

/**
 * Parse the first YAML document in `text`.
 *
 * @param text - File content
 * @param path - Source path, used only in the error message
 * @returns The document as plain JS values; null for an empty document
 * @throws {ConfigParseError} If the document does not parse
 */
export function parseYamlDocument(text: string, path: string): unknown {
  const first = parseAllDocuments(text, { uniqueKeys: false })[0];
  if (first === undefined) {
    return null;
  }
  const [error] = first.errors;
  if (error !== undefined) {
    throw new ConfigParseError(path, error.message, { cause: error });
  }

  try {
    const doc: unknown = first.toJS();
    return doc ?? null;
  } catch (err: unknown) {
    // toJS() throws on unresolvable aliases
    if (err instanceof Error) {
      throw new ConfigParseError(path, err.message, { cause: err });
    }
    throw err;
  }
}

/**
 * True if a parsed document is a top-level mapping.
 */
export function isYamlMapping(doc: unknown): doc is Record<string, unknown> {
  return typeof doc === 'object' && doc !== null && !Array.isArray(doc);
}
