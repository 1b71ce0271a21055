/**
 * End-to-end tests: script files through the loader, parser and tree queries
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  GenericParser,
  IncludeError,
  PdxTokenType,
  getChild,
  getChildren,
  getValue,
  getValues,
  parseScript,
  parseScriptFile,
  printTree,
  toPlainObject,
  tokenize,
} from './index.js';

const PROVINCE = `# Paris
owner = FRA
controller = FRA
add_core = FRA
culture = french
religion = catholic
hre = no
base_tax = 10
trade_goods = cloth
discovered_by = western
discovered_by = eastern
color = { 10 20 30 }
neighbours = { 10 20 30 40 }

1444.11.11 = {
  owner = FRA
  add_core = ENG
}
1500.2.30 = {
  controller = ENG
}
`;

describe('Integration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pdx-integration-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses a province history file', () => {
    const { root, errors } = parseScript(PROVINCE);

    expect(errors).toEqual([]);
    expect(getValue(root, 'owner', '')).toBe('FRA');
    expect(getValue(root, 'hre', true)).toBe(false);
    expect(getValue(root, 'base_tax', 0)).toBe(10);
    expect(getValue(root, 'discovered_by', '')).toBe('eastern');
    expect(getValues(root, 'color', 'number')).toEqual([10, 20, 30]);
    expect(getValues(root, 'neighbours', 'number')).toEqual([10, 20, 30, 40]);

    const start = getChild(root, '1444.11.11');
    expect(start?.type === 'Date' && start.date).toEqual({ year: 1444, month: 11, day: 11 });
    expect(getValue(start ?? root, 'add_core', '')).toBe('ENG');

    const late = getChild(root, '1500.2.30');
    expect(late?.type === 'Date' && late.date).toEqual({ year: 1500, month: 2, day: 30 });
  });

  it('keeps every repeated key when accumulating', () => {
    const { root } = parseScript(PROVINCE, { config: { accumulateDuplicates: true } });

    expect(getValues(root, 'discovered_by', 'string')).toEqual(['western', 'eastern']);
    expect(getChildren(root, 'owner')).toHaveLength(1);
  });

  it('returns an empty root for empty and comment-only input', () => {
    for (const source of ['', '# nothing here\n# at all']) {
      const root = new GenericParser().parse(source);

      expect(root).toEqual({ type: 'Object', key: 'root', children: new Map() });
    }
  });

  it('lets the last of several duplicates win', () => {
    const { root } = parseScript('owner = FRA\nowner = ENG\nowner = CAS');

    expect(root.children.size).toBe(1);
    expect(getValue(root, 'owner', '')).toBe('CAS');
  });

  it('keeps valid statements around a malformed one', () => {
    const { root, errors } = parseScript('owner = FRA\ncapital = 183\ngarbage\nculture = french\nbase_tax = 3');

    expect(errors).toHaveLength(1);
    expect(getValue(root, 'owner', '')).toBe('FRA');
    expect(getValue(root, 'capital', 0)).toBe(183);
    expect(getValue(root, 'culture', '')).toBe('french');
    expect(getValue(root, 'base_tax', 0)).toBe(3);
  });

  it('reads yes/true and no/false text as booleans', () => {
    const { root } = parseScript('a = "yes"\nb = "YES"\nc = "true"\nd = "no"\ne = "false"');

    expect(['a', 'b', 'c', 'd', 'e'].map((key) => getValue(root, key, false))).toEqual([
      true,
      true,
      true,
      false,
      false,
    ]);
    expect(['d', 'e'].map((key) => getValue(root, key, true))).toEqual([false, false]);
  });

  it('reaches nested values through child lookups', () => {
    const { root } = parseScript('a = { b = { c = 1 } }');
    const b = getChild(getChild(root, 'a') ?? root, 'b');
    const c = getChild(b ?? root, 'c');

    expect(c).toEqual({ type: 'Scalar', key: 'c', value: 1, valueType: 'integer' });
  });

  it('tells colours from numeric lists', () => {
    expect(tokenize('color = { 10 20 30 }').map((t) => t.type)).toEqual([
      PdxTokenType.IDENTIFIER,
      PdxTokenType.EQUALS,
      PdxTokenType.COLOR,
      PdxTokenType.EOF,
    ]);
    expect(tokenize('list = { 10 20 30 40 }').filter((t) => t.type === PdxTokenType.NUMBER)).toHaveLength(4);
  });

  it('fails two files including each other with a cycle error', async () => {
    const a = join(dir, 'a.txt');
    await writeFile(a, 'from_a = yes\n@include "b.txt"');
    await writeFile(join(dir, 'b.txt'), 'from_b = yes\n@include "a.txt"');

    const result = await parseScriptFile(a);

    expect(getValue(result.root, 'from_a', false)).toBe(true);
    expect(getValue(result.root, 'from_b', false)).toBe(true);
    expect(result.diagnostics.map((d) => d.error instanceof IncludeError && d.error.reason)).toEqual(['cycle']);
  });

  it('exports a __proto__ block as data', () => {
    const { root } = parseScript('__proto__ = { polluted = yes }\nowner = FRA');

    expect(JSON.stringify(toPlainObject(root))).toBe('{"__proto__":{"polluted":true},"owner":"FRA"}');
    expect(Object.getPrototypeOf(toPlainObject(root))).toBe(Object.prototype);
  });

  it('prints a parsed tree', () => {
    const { root } = parseScript('owner = FRA\n1444.1.1 = { add_core = ENG }\ncolor = { 1 2 3 }');

    expect(printTree(root)).toBe(
      [
        'root = {',
        '  owner = FRA',
        '  1444.1.1 = { # Date: 1444.1.1',
        '    add_core = ENG',
        '  }',
        '  color = [',
        '    1',
        '    2',
        '    3',
        '  ]',
        '}',
        '',
      ].join('\n')
    );
  });
});
