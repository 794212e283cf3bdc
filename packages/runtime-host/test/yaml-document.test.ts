/**
 * Stepwise Runtime Host - YAML Document Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigParseError } from '@stepwise/kernel';
import { isYamlMapping, parseYamlDocument } from '../src/yaml/document.js';

const PATH = '/test/modules/example.conf';

describe('parseYamlDocument', () => {
  it('parses a mapping into plain values', () => {
    const doc = parseYamlDocument('emergency: true\nmountOptions:\n  - noatime\n  - ro\n', PATH);
    expect(doc).toEqual({ emergency: true, mountOptions: ['noatime', 'ro'] });
  });

  it('returns null for an empty document', () => {
    expect(parseYamlDocument('', PATH)).toBeNull();
  });

  it('returns null for a comment-only document', () => {
    expect(parseYamlDocument('# nothing configured yet\n', PATH)).toBeNull();
  });

  it('returns a list for a top-level sequence', () => {
    expect(parseYamlDocument('- one\n- two\n', PATH)).toEqual(['one', 'two']);
  });

  it('throws ConfigParseError naming the path on a syntax error', () => {
    let caught: unknown;
    try {
      parseYamlDocument('items: [1, 2\n', PATH);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigParseError);
    expect(caught instanceof ConfigParseError && caught.path).toBe(PATH);
    expect(caught instanceof ConfigParseError && caught.message).toMatch(/^YAML parser error in \/test\/modules\/example\.conf: /);
  });

  it('keeps the last value of a repeated key', () => {
    expect(parseYamlDocument('a: 1\nb: x\na: 2\n', PATH)).toEqual({ a: 2, b: 'x' });
  });

  it('reads only the first document of a stream', () => {
    expect(parseYamlDocument('a: 1\n---\nb: 2\n', PATH)).toEqual({ a: 1 });
  });

  it('returns null when the first document of a stream is empty', () => {
    expect(parseYamlDocument('---\n---\nb: 2\n', PATH)).toBeNull();
  });

  it('ignores a syntax error after the first document', () => {
    expect(parseYamlDocument('a: 1\n---\nb: [2\n', PATH)).toEqual({ a: 1 });
  });
});

describe('isYamlMapping', () => {
  it('accepts plain objects only', () => {
    expect(isYamlMapping({ a: 1 })).toBe(true);
    expect(isYamlMapping({})).toBe(true);
    expect(isYamlMapping(['a'])).toBe(false);
    expect(isYamlMapping('scalar')).toBe(false);
    expect(isYamlMapping(42)).toBe(false);
    expect(isYamlMapping(null)).toBe(false);
  });
});
