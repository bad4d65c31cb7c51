/**
 * Content value model
 * @module splunk-client/value
 */

export {
  DynamicMapBuilder,
  isList,
  isMap,
  isScalar,
  list,
  map,
  scalar,
  type ContentValue,
  type DynamicValue,
  type ListValue,
  type MapValue,
  type PlainValue,
  type ScalarValue,
} from './value.js';

export { convertPath, getPath, getScalar, toPlainValue } from './path.js';
