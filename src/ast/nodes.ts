import { InvalidNodeOperationError } from '../errors/index.js';
import type { PdxDate } from './date.js';

export type ScalarValue = string | number | boolean | PdxDate;

export type ScalarType = 'text' | 'integer' | 'float' | 'boolean' | 'date';

// owner = FRA
export interface ScalarNode {
  type: 'Scalar';
  key: string;
  value: ScalarValue;
  valueType: ScalarType;
}

// settings = { difficulty = normal }
export interface ObjectNode {
  type: 'Object';
  key: string;
  children: Map<string, PdxNode>;
}

// list = { 10 20 30 40 }, or repeated keys under accumulating insertion
export interface ListNode {
  type: 'List';
  /** Empty for items inside a list */
  key: string;
  items: PdxNode[];
}

// 1444.11.11 = { owner = FRA }
export interface DateNode {
  type: 'Date';
  /** The date literal as written */
  key: string;
  date: PdxDate;
  children: Map<string, PdxNode>;
}

export type PdxNode = ScalarNode | ObjectNode | ListNode | DateNode;

/** Nodes that hold keyed children */
export type ContainerNode = ObjectNode | DateNode;

export function isContainer(node: PdxNode): node is ContainerNode {
  return node.type === 'Object' || node.type === 'Date';
}

// ============================================
// Factories
// ============================================

export function createScalar(key: string, value: ScalarValue, valueType?: ScalarType): ScalarNode {
  return { type: 'Scalar', key, value, valueType: valueType ?? inferScalarType(value) };
}

export function createObject(key: string): ObjectNode {
  return { type: 'Object', key, children: new Map() };
}

export function createList(key: string, items: PdxNode[] = []): ListNode {
  return { type: 'List', key, items: [...items] };
}

export function createDate(key: string, date: PdxDate): DateNode {
  return { type: 'Date', key, date, children: new Map() };
}

function inferScalarType(value: ScalarValue): ScalarType {
  switch (typeof value) {
    case 'string':
      return 'text';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    default:
      return 'date';
  }
}

// ============================================
// Building-time mutation
// ============================================

function assertContainer(node: PdxNode, operation: string): asserts node is ContainerNode {
  if (!isContainer(node)) {
    throw new InvalidNodeOperationError(operation, node.type);
  }
}

/**
 * Add a child under its key. An existing child with the same key is replaced.
 * @throws InvalidNodeOperationError on Scalar and List nodes
 */
export function addChild(node: PdxNode, child: PdxNode): void {
  assertContainer(node, 'add a child');
  node.children.set(child.key, child);
}

/**
 * Add a child, turning repeated keys into a list:
 * `discovered_by = western` twice yields `discovered_by = [western, western]`.
 * @throws InvalidNodeOperationError on Scalar and List nodes
 */
export function addChildAccumulating(node: PdxNode, child: PdxNode): void {
  assertContainer(node, 'add a child');

  const existing = node.children.get(child.key);
  if (!existing) {
    node.children.set(child.key, child);
  } else if (existing.type === 'List') {
    existing.items.push(child);
  } else {
    node.children.set(child.key, createList(child.key, [existing, child]));
  }
}

/**
 * @throws InvalidNodeOperationError on anything but a List node
 */
export function addItem(node: PdxNode, item: PdxNode): void {
  if (node.type !== 'List') {
    throw new InvalidNodeOperationError('add an item', node.type);
  }
  node.items.push(item);
}
