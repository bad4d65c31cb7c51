/**
 * Parameter value types and their wire formatters
 * @module splunk-client/args/types
 */

import { enumMembers, type EnumAliases, type EnumObject, type EnumValue } from '../converters/index.js';

export type ArgKind = 'scalar' | 'enumeration' | 'list';

/**
 * Declared type of a parameter
 *
 * `format` renders a value as wire text: one string for scalars and
 * enumerations, one per item for lists.
 */
export interface ArgType<T> {
  readonly kind: ArgKind;
  readonly typeName: string;

  /**
   * Item type of a list
   */
  readonly itemType?: ArgType<unknown>;

  is(value: unknown): value is T;
  format(value: T): string[];
}

function scalarType<T>(typeName: string, is: (value: unknown) => value is T, format: (value: T) => string): ArgType<T> {
  return Object.freeze({
    kind: 'scalar',
    typeName,
    is,
    format: (value: T) => [format(value)],
  });
}

const stringType = scalarType('string', (v): v is string => typeof v === 'string', (v) => v);

const booleanType = scalarType(
  'boolean',
  (v): v is boolean => typeof v === 'boolean',
  (v) => (v ? 't' : 'f')
);

const integerType = scalarType(
  'integer',
  (v): v is number => typeof v === 'number' && Number.isInteger(v),
  (v) => String(v)
);

const numberType = scalarType(
  'number',
  (v): v is number => typeof v === 'number' && !Number.isNaN(v),
  (v) => String(v)
);

const bigintType = scalarType(
  'bigint',
  (v): v is bigint => typeof v === 'bigint',
  (v) => v.toString()
);

const unknownType = scalarType('unknown', (v): v is unknown => v !== undefined, (v) => String(v));

function enumeration<E extends EnumObject>(
  typeName: string,
  enumObject: E,
  aliases?: EnumAliases<E>
): ArgType<EnumValue<E>> {
  const members = enumMembers(enumObject, aliases);
  const isMember = (value: unknown): value is EnumValue<E> => members.some((m) => m.value === value);

  return Object.freeze({
    kind: 'enumeration',
    typeName,
    is: isMember,
    format(value: EnumValue<E>) {
      const member = members.find((m) => m.value === value);
      return member ? [member.wireName] : [];
    },
  });
}

function list<T>(itemType: ArgType<T>): ArgType<readonly T[]> {
  return Object.freeze({
    kind: 'list',
    typeName: `${itemType.typeName}[]`,
    itemType,
    is: (value: unknown): value is readonly T[] =>
      Array.isArray(value) && value.every((item) => itemType.is(item)),
    format: (value: readonly T[]) => value.flatMap((item) => itemType.format(item)),
  });
}

/**
 * Built-in parameter types
 */
export const ArgTypes = Object.freeze({
  string: stringType,
  boolean: booleanType,
  integer: integerType,
  number: numberType,
  bigint: bigintType,

  /**
   * Any other value, rendered with `String(value)`
   */
  unknown: unknownType,

  enumeration,
  list,
});
