export {
  createScalar,
  createObject,
  createList,
  createDate,
  addChild,
  addChildAccumulating,
  addItem,
  isContainer,
  type PdxNode,
  type ScalarNode,
  type ObjectNode,
  type ListNode,
  type DateNode,
  type ContainerNode,
  type ScalarValue,
  type ScalarType,
} from './nodes.js';
export {
  getChild,
  getChildren,
  getValue,
  getValues,
  hasChild,
  toBoolean,
  toNumber,
  toText,
  toDate,
  type ValueKind,
} from './tree.js';
export {
  parseDate,
  formatDate,
  compareDates,
  isValidDateText,
  isPdxDate,
  type PdxDate,
} from './date.js';
export { printTree, toPlainObject, type PlainValue } from './printer.js';
