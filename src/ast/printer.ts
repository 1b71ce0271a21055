import { InvalidNodeOperationError } from '../errors/index.js';
import { formatDate } from './date.js';
import type { PdxNode } from './nodes.js';
import { toText } from './tree.js';

export type PlainValue = string | number | boolean | PlainValue[] | { [key: string]: PlainValue };

/**
 * Indented dump of a tree, for debugging
 *
 * @example
 * printTree(root)
 * // root = {
 * //   owner = FRA
 * //   1444.11.11 = { # Date: 1444.11.11
 * //     add_core = FRA
 * //   }
 * // }
 */
export function printTree(node: PdxNode, indentSize = 2): string {
  const lines: string[] = [];
  printNode(node, 0, indentSize, lines);
  return lines.join('\n') + '\n';
}

function printNode(node: PdxNode, depth: number, indentSize: number, lines: string[]): void {
  const indent = ' '.repeat(depth * indentSize);
  const label = node.key ? `${node.key} = ` : '';

  switch (node.type) {
    case 'Scalar':
      lines.push(`${indent}${label}${toText(node.value)}`);
      break;

    case 'Date':
      lines.push(`${indent}${label}{ # Date: ${formatDate(node.date)}`);
      for (const child of node.children.values()) {
        printNode(child, depth + 1, indentSize, lines);
      }
      lines.push(`${indent}}`);
      break;

    case 'Object':
      lines.push(`${indent}${label}{`);
      for (const child of node.children.values()) {
        printNode(child, depth + 1, indentSize, lines);
      }
      lines.push(`${indent}}`);
      break;

    case 'List':
      lines.push(`${indent}${label}[`);
      for (const item of node.items) {
        printNode(item, depth + 1, indentSize, lines);
      }
      lines.push(`${indent}]`);
      break;
  }
}

const DATE_MARKER = '@date';

/**
 * Convert a tree to JSON-friendly values. Date blocks keep their date under
 * `@date`; dates are written as `YEAR.MONTH.DAY`. Every key becomes an own
 * property, `__proto__` included.
 *
 * @throws InvalidNodeOperationError when a date block has a child keyed `@date`
 */
export function toPlainObject(node: PdxNode): PlainValue {
  switch (node.type) {
    case 'Scalar':
      return typeof node.value === 'object' ? formatDate(node.value) : node.value;

    case 'List':
      return node.items.map(toPlainObject);

    case 'Object':
    case 'Date': {
      const result: { [key: string]: PlainValue } = {};
      if (node.type === 'Date') {
        if (node.children.has(DATE_MARKER)) {
          throw new InvalidNodeOperationError(`export child '${DATE_MARKER}'`, node.type);
        }
        setOwn(result, DATE_MARKER, formatDate(node.date));
      }
      for (const [key, child] of node.children) {
        setOwn(result, key, toPlainObject(child));
      }
      return result;
    }
  }
}

function setOwn(target: { [key: string]: PlainValue }, key: string, value: PlainValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
