import { describe, it, expect } from 'vitest';
import { GenericParser } from './index.js';
import { getChild, getChildren, getValue, toPlainObject, type PdxNode } from '../ast/index.js';
import { StringPool } from '../utils/index.js';

function parse(source: string, parser = new GenericParser()) {
  const root = parser.parse(source);
  return { root, errors: parser.errors, parser };
}

function scalarValues(node: PdxNode | undefined): unknown[] {
  if (!node || node.type !== 'List') return [];
  return node.items.map((item) => (item.type === 'Scalar' ? item.value : item.type));
}

describe('GenericParser', () => {
  describe('assignments', () => {
    it('parses a province file', () => {
      const { root, errors } = parse(`
owner = FRA
culture = french
hre = no
base_tax = 3
base_production = 2.5
capital = "Paris"
`);

      expect(errors).toEqual([]);
      expect(root.key).toBe('root');
      expect(toPlainObject(root)).toEqual({
        owner: 'FRA',
        culture: 'french',
        hre: false,
        base_tax: 3,
        base_production: 2.5,
        capital: 'Paris',
      });
    });

    it('records the scalar type', () => {
      const { root } = parse('a = 3\nb = 2.5\nc = yes\nd = text\ne = "quoted"\nf = 1444.1.1');

      expect([...root.children.values()].map((n) => n.type === 'Scalar' && n.valueType)).toEqual([
        'integer',
        'float',
        'boolean',
        'text',
        'text',
        'date',
      ]);
    });

    it('reads true and false identifiers as booleans', () => {
      const { root } = parse('a = true\nb = FALSE\nc = Yes');

      expect(toPlainObject(root)).toEqual({ a: true, b: false, c: true });
    });

    it('keeps numbers it cannot represent as text or floats', () => {
      const { root } = parse('version = 1.2.3.4\nbig = 12345678901234567890\nneg = -17');

      expect(getChild(root, 'version')).toMatchObject({ value: '1.2.3.4', valueType: 'text' });
      expect(getChild(root, 'big')).toMatchObject({ value: Number('12345678901234567890'), valueType: 'float' });
      expect(getChild(root, 'neg')).toMatchObject({ value: -17, valueType: 'integer' });
    });

    it('lets the last duplicate win', () => {
      const { root } = parse('add_core = FRA\nadd_core = ENG');

      expect(getValue(root, 'add_core', '')).toBe('ENG');
    });

    it('accumulates duplicates into a list when configured', () => {
      const parser = new GenericParser({ config: { accumulateDuplicates: true } });
      const { root } = parse('add_core = FRA\nadd_core = ENG\nowner = FRA', parser);

      expect(scalarValues(getChild(root, 'add_core'))).toEqual(['FRA', 'ENG']);
      expect(getValue(root, 'owner', '')).toBe('FRA');
    });

    it('accumulates at every nesting level', () => {
      const parser = new GenericParser({ config: { accumulateDuplicates: true } });
      const { root } = parse('1444.1.1 = { add_core = A add_core = B }', parser);

      expect(scalarValues(getChild(getChild(root, '1444.1.1') ?? root, 'add_core'))).toEqual(['A', 'B']);
    });

    it('uses the configured root key', () => {
      const parser = new GenericParser({ config: { rootKey: 'province' } });

      expect(parser.parse('a = 1').key).toBe('province');
    });

    it('ignores comments', () => {
      const { root, errors } = parse('# header\nowner = FRA # trailing\n# footer');

      expect(errors).toEqual([]);
      expect(toPlainObject(root)).toEqual({ owner: 'FRA' });
    });

    it('skips comments between the operator and the value', () => {
      const { root } = parse('owner = # who\nFRA');

      expect(getValue(root, 'owner', '')).toBe('FRA');
    });
  });

  describe('blocks', () => {
    it('parses nested objects', () => {
      const { root } = parse('a = { b = { c = 1 } }');
      const b = getChild(getChild(root, 'a') ?? root, 'b');

      expect(b?.type).toBe('Object');
      expect(getValue(b ?? root, 'c', 0)).toBe(1);
    });

    it('parses date blocks', () => {
      const { root } = parse('1444.11.11 = {\n  owner = ENG\n}');
      const block = getChild(root, '1444.11.11');

      expect(block).toMatchObject({ type: 'Date', key: '1444.11.11', date: { year: 1444, month: 11, day: 11 } });
      expect(getValue(block ?? root, 'owner', '')).toBe('ENG');
    });

    it('stores a date assignment as a scalar under the date key', () => {
      const { root } = parse('1450.1.1 = 1451.2.3\n1452.1.1 = FRA');

      expect(getChild(root, '1450.1.1')).toEqual({
        type: 'Scalar',
        key: '1450.1.1',
        value: { year: 1451, month: 2, day: 3 },
        valueType: 'date',
      });
      expect(getValue(root, '1452.1.1', '')).toBe('FRA');
    });

    it('parses date blocks nested in objects', () => {
      const { root } = parse('history = { 1444.1.1 = { owner = FRA } }');
      const history = getChild(root, 'history');

      expect(history?.type).toBe('Object');
      expect(getChild(history ?? root, '1444.1.1')?.type).toBe('Date');
    });

    it('keeps an empty block as an empty object', () => {
      const { root, errors } = parse('modifiers = { }');

      expect(errors).toEqual([]);
      expect(getChild(root, 'modifiers')).toEqual({ type: 'Object', key: 'modifiers', children: new Map() });
    });
  });

  describe('lists', () => {
    it('parses a numeric list', () => {
      const { root, errors } = parse('list = { 10 20 30 40 }');
      const list = getChild(root, 'list');

      expect(errors).toEqual([]);
      expect(list?.type).toBe('List');
      expect(scalarValues(list)).toEqual([10, 20, 30, 40]);
      expect(getChildren(root, 'list').map((n) => n.key)).toEqual(['', '', '', '']);
    });

    it('parses lists of identifiers and strings', () => {
      const { root } = parse('names = { "Jean Luc" Pierre }\ntags = { FRA ENG }');

      expect(scalarValues(getChild(root, 'names'))).toEqual(['Jean Luc', 'Pierre']);
      expect(scalarValues(getChild(root, 'tags'))).toEqual(['FRA', 'ENG']);
    });

    it('parses mixed values', () => {
      const { root } = parse('m = { 1 yes "x" 1444.1.1 }');

      expect(scalarValues(getChild(root, 'm'))).toEqual([1, true, 'x', { year: 1444, month: 1, day: 1 }]);
    });

    it('skips comments inside lists', () => {
      const { root } = parse('l = {\n  a # first\n  b\n}');

      expect(scalarValues(getChild(root, 'l'))).toEqual(['a', 'b']);
    });

    it('parses lists of anonymous blocks', () => {
      const { root } = parse('g = { { a = 1 } { a = 2 } }');
      const items = getChildren(root, 'g');

      expect(items).toHaveLength(2);
      expect(items.map((item) => item.type)).toEqual(['Object', 'Object']);
      expect(items.map((item) => getValue(item, 'a', 0))).toEqual([1, 2]);
    });

    it('parses colours as lists of three integers', () => {
      const { root, errors } = parse('color = { 255 128 0 }');

      expect(errors).toEqual([]);
      expect(getChild(root, 'color')).toEqual({
        type: 'List',
        key: 'color',
        items: [
          { type: 'Scalar', key: '', value: 255, valueType: 'integer' },
          { type: 'Scalar', key: '', value: 128, valueType: 'integer' },
          { type: 'Scalar', key: '', value: 0, valueType: 'integer' },
        ],
      });
    });
  });

  describe('error recovery', () => {
    it('recovers from a line without an operator', () => {
      const { root, errors } = parse('owner = FRA\ninvalid_line_without_equals\nculture = french');

      expect(errors).toEqual([
        "Expected '=' after 'invalid_line_without_equals', found IDENTIFIER 'culture' at line 3, column 1",
      ]);
      expect(toPlainObject(root)).toEqual({ owner: 'FRA', culture: 'french' });
    });

    it('keeps the enclosing block when a nested statement is broken', () => {
      const { root, errors } = parse('a = {\n  b = 1\n  broken\n}\nc = 2');

      expect(errors).toEqual(["Expected '=' after 'broken', found RBRACE '}' at line 4, column 1"]);
      expect(toPlainObject(root)).toEqual({ a: { b: 1 }, c: 2 });
    });

    it('abandons a date key without an operator', () => {
      const { root, errors } = parse('1444.1.1 owner = FRA');

      expect(errors).toEqual(["Expected '=' after '1444.1.1', found IDENTIFIER 'owner' at line 1, column 10"]);
      expect(toPlainObject(root)).toEqual({ owner: 'FRA' });
    });

    it('skips tokens that cannot start a statement', () => {
      const { root, errors } = parse('= 5\nowner = FRA');

      expect(errors).toEqual(["Unexpected EQUALS '=', expected a key at line 1, column 1"]);
      expect(toPlainObject(root)).toEqual({ owner: 'FRA' });
    });

    it('skips a stray block as a unit', () => {
      const { root, errors } = parse('{ x = 1 }\ny = 2');

      expect(errors).toEqual(["Unexpected LBRACE '{', expected a key at line 1, column 1"]);
      expect(toPlainObject(root)).toEqual({ y: 2 });
    });

    it('skips the block after a key missing its operator as a unit', () => {
      const { root, errors } = parse('owner = FRA\nbad { x = 1 y = { z = 2 } }\nculture = french');

      expect(errors).toEqual(["Expected '=' after 'bad', found LBRACE '{' at line 2, column 5"]);
      expect(toPlainObject(root)).toEqual({ owner: 'FRA', culture: 'french' });
    });

    it('skips a stray closing brace at the top level', () => {
      const { root, errors } = parse('}\na = 1');

      expect(errors).toHaveLength(1);
      expect(toPlainObject(root)).toEqual({ a: 1 });
    });

    it('does not consume a closing brace in place of a value', () => {
      const { root, errors } = parse('obj = { a = }\nb = 1');

      expect(errors).toEqual(["Expected a value after 'a =', found RBRACE '}' at line 1, column 13"]);
      expect(toPlainObject(root)).toEqual({ obj: {}, b: 1 });
    });

    it('reports a missing value at the end of input', () => {
      const { errors } = parse('a =');

      expect(errors).toEqual(["Expected a value after 'a =', found end of input at line 1, column 4"]);
    });

    it('skips an operator in place of a value', () => {
      const { root, errors } = parse('a = >\nb = 1');

      expect(errors).toEqual(["Expected a value after 'a =', found GT '>' at line 1, column 5"]);
      expect(toPlainObject(root)).toEqual({ b: 1 });
    });

    it('keeps a block that is never closed', () => {
      const { root, errors } = parse('a = {\n  b = 1\n');

      expect(errors).toEqual([
        "Expected '}' to close 'a' opened at line 1, column 5, found end of input at line 3, column 1",
      ]);
      expect(toPlainObject(root)).toEqual({ a: { b: 1 } });
    });

    it('renders diagnostics with the offending source line', () => {
      const { parser } = parse('owner = FRA\ninvalid_line_without_equals\nculture = french');

      expect(parser.diagnostics[0].error.format()).toBe(
        [
          "ParseError: Expected '=' after 'invalid_line_without_equals', found IDENTIFIER 'culture' at line 3, column 1",
          '  --> 3:1',
          '  |',
          '3 | culture = french',
          '  | ^',
          "  found: 'culture'",
        ].join('\n')
      );
    });
  });

  describe('empty input', () => {
    it('returns an empty root without errors', () => {
      for (const source of ['', '   \n\t', '# just a comment']) {
        const { root, errors } = parse(source);

        expect(root.children.size).toBe(0);
        expect(errors).toEqual([]);
      }
    });
  });

  describe('string interning', () => {
    it('interns keys and text values', () => {
      const pool = new StringPool();
      parse('a = FRA\nb = FRA', new GenericParser({ interner: pool }));

      expect(pool.getStatistics()).toEqual({ uniqueStrings: 3, totalReferences: 4, estimatedBytes: 10 });
    });
  });
});
