/**
 * Query surface handed to extractors: child lookup and lenient scalar coercion.
 *
 * Coercion never throws. A value that cannot be converted to the requested
 * type yields the caller's default.
 */

import { formatDate, isValidDateText, parseDate, type PdxDate } from './date.js';
import { isContainer, type PdxNode, type ScalarValue } from './nodes.js';

export type ValueKind = 'boolean' | 'number' | 'string' | 'date';

export function getChild(node: PdxNode, key: string): PdxNode | undefined {
  return isContainer(node) ? node.children.get(key) : undefined;
}

export function hasChild(node: PdxNode, key: string): boolean {
  return isContainer(node) && node.children.has(key);
}

/**
 * All nodes stored under `key`: the items of a list, the single child, or nothing.
 */
export function getChildren(node: PdxNode, key: string): PdxNode[] {
  const child = getChild(node, key);
  if (!child) return [];
  return child.type === 'List' ? [...child.items] : [child];
}

/**
 * Read the scalar under `key`, converted to the type of `defaultValue`.
 *
 * @example getValue(province, 'base_tax', 0) // => 3
 * @example getValue(province, 'hre', false) // 'yes' | 'true' => true
 */
export function getValue(node: PdxNode, key: string, defaultValue: boolean): boolean;
export function getValue(node: PdxNode, key: string, defaultValue: number): number;
export function getValue(node: PdxNode, key: string, defaultValue: string): string;
export function getValue(node: PdxNode, key: string, defaultValue: PdxDate): PdxDate;
export function getValue(node: PdxNode, key: string, defaultValue: ScalarValue): ScalarValue {
  const child = getChild(node, key);
  if (!child || child.type !== 'Scalar') return defaultValue;

  return coerce(child.value, kindOf(defaultValue)) ?? defaultValue;
}

/**
 * Read every scalar under `key` (see {@link getChildren}) as `kind`,
 * dropping the ones that do not convert.
 *
 * @example getValues(province, 'add_core', 'string') // => ['FRA', 'ENG']
 */
export function getValues(node: PdxNode, key: string, kind: 'boolean'): boolean[];
export function getValues(node: PdxNode, key: string, kind: 'number'): number[];
export function getValues(node: PdxNode, key: string, kind: 'string'): string[];
export function getValues(node: PdxNode, key: string, kind: 'date'): PdxDate[];
export function getValues(node: PdxNode, key: string, kind: ValueKind): ScalarValue[] {
  const values: ScalarValue[] = [];
  for (const child of getChildren(node, key)) {
    if (child.type !== 'Scalar') continue;
    const converted = coerce(child.value, kind);
    if (converted !== undefined) values.push(converted);
  }
  return values;
}

function kindOf(value: ScalarValue): ValueKind {
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'date';
  }
}

function coerce(value: ScalarValue, kind: ValueKind): ScalarValue | undefined {
  switch (kind) {
    case 'boolean':
      return toBoolean(value);
    case 'number':
      return toNumber(value);
    case 'string':
      return toText(value);
    case 'date':
      return toDate(value);
  }
}

// ============================================
// Conversions
// ============================================

// '.' is the only decimal separator, whatever the host locale
const INVARIANT_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function toBoolean(value: ScalarValue): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    switch (value.trim().toLowerCase()) {
      case 'yes':
      case 'true':
        return true;
      case 'no':
      case 'false':
        return false;
    }
  }
  return undefined;
}

export function toNumber(value: ScalarValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const text = value.trim();
    return INVARIANT_NUMBER.test(text) ? Number(text) : undefined;
  }
  return undefined;
}

export function toText(value: ScalarValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return formatDate(value);
}

export function toDate(value: ScalarValue): PdxDate | undefined {
  if (typeof value === 'string') {
    const text = value.trim();
    return isValidDateText(text) ? parseDate(text) : undefined;
  }
  if (typeof value === 'object') return value;
  return undefined;
}
