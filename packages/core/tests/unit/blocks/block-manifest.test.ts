import { describe, expect, it } from 'vitest';
import { parseBlockManifest } from '../../../src/blocks/block-manifest.js';
import { PackageError } from '../../../src/utils/errors.js';

const FULL = `
name: wordcount
description: Counts words
version: 1.2.0
source:
  type: github
  repo: acme/wordcount
binary:
  from: release
  assets:
    linux-amd64: wordcount-linux-amd64
    darwin-arm64: wordcount-darwin-arm64
entries:
  - name: count
    command: count
    description: Count words on stdin
    inputs:
      - name: text
        type: string
    outputs:
      - name: total
        type: number
  - name: top
    command: top
`;

describe('parseBlockManifest', () => {
  it('parses a complete manifest and keys entries by name', () => {
    const info = parseBlockManifest(FULL, 'acme/wordcount');

    expect(info.name).toBe('wordcount');
    expect(info.version).toBe('1.2.0');
    expect(info.source).toEqual({ type: 'github', repo: 'acme/wordcount' });
    expect(info.binary).toEqual({
      from: 'release',
      assets: { 'linux-amd64': 'wordcount-linux-amd64', 'darwin-arm64': 'wordcount-darwin-arm64' },
    });
    expect(Object.keys(info.entries)).toEqual(['count', 'top']);
    expect(info.entries.count).toEqual({
      name: 'count',
      command: 'count',
      description: 'Count words on stdin',
      inputs: [{ name: 'text', type: 'string' }],
      outputs: [{ name: 'total', type: 'number' }],
    });
    expect(info.entries.top).toEqual({ name: 'top', command: 'top', description: '', inputs: [], outputs: [] });
  });

  it('fills absent sections with empty values', () => {
    const info = parseBlockManifest('name: tiny\nbinary:\nentries:\n', 'acme/tiny');

    expect(info).toEqual({
      name: 'tiny',
      description: '',
      version: '',
      source: { type: '', repo: '' },
      binary: { from: '', assets: {} },
      entries: {},
    });
  });

  it('reads YAML nulls as absent values', () => {
    const info = parseBlockManifest(
      [
        'name: nullable',
        'description: ~',
        'source: null',
        'binary:',
        '  from: release',
        '  assets: ~',
        'entries:',
        '  - name: run',
        '    command: null',
        '    inputs: null',
        '    outputs: ~',
        '',
      ].join('\n'),
      'acme/nullable',
    );

    expect(info.description).toBe('');
    expect(info.source).toEqual({ type: '', repo: '' });
    expect(info.binary).toEqual({ from: 'release', assets: {} });
    expect(info.entries.run).toEqual({ name: 'run', command: '', description: '', inputs: [], outputs: [] });
  });

  it('rejects a name that cannot be a directory', () => {
    expect(() => parseBlockManifest('name: "../escape"', 'acme/bad')).toThrow(
      'invalid block manifest in acme/bad: name: must contain only letters, digits, ".", "_" or "-"',
    );
  });

  it('requires a name', () => {
    expect(() => parseBlockManifest('description: nameless', 'acme/bad')).toThrow(
      'invalid block manifest in acme/bad: name: Required',
    );
  });

  it('wraps YAML syntax errors', () => {
    let caught: unknown;
    try {
      parseBlockManifest('name: [unclosed', 'acme/broken');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PackageError);
    expect(caught).toMatchObject({ repo: 'acme/broken' });
    expect(caught instanceof Error && caught.message.startsWith('failed to parse block manifest of acme/broken: ')).toBe(true);
  });
});
