/**
 * Parameter declarations and their resolved form
 * @module splunk-client/args/parameter
 */

import type { ArgType } from './types.js';

export interface ParameterOptions<T> {
  /**
   * Wire name
   */
  readonly name: string;

  /**
   * Ordering key; parameters serialize by `(order, name)`
   */
  readonly order: number;

  /**
   * Value a new holder starts with; a value equal to it is not sent
   */
  readonly defaultValue?: T | null;

  /**
   * Send the value even when it equals the default
   */
  readonly emitDefault?: boolean;

  readonly required?: boolean;
}

export interface ParameterDeclaration<T> extends ParameterOptions<T> {
  readonly type: ArgType<T>;
}

export function parameter<T>(type: ArgType<T>, options: ParameterOptions<T>): ParameterDeclaration<T> {
  return Object.freeze({ ...options, type });
}

/**
 * A declaration bound to its holder field, with the formatter resolved
 */
export interface Parameter<V> {
  readonly name: string;
  readonly order: number;

  /**
   * Property of the holder the value is read from
   */
  readonly field: string;

  readonly defaultValue: unknown;
  readonly emitDefault: boolean;
  readonly required: boolean;
  readonly isCollection: boolean;

  read(values: Partial<V>): unknown;

  /**
   * Wire text of a value; one entry per item for collections
   *
   * @throws SerializationError for values outside the declared type
   */
  format(value: unknown): readonly string[];
}

/**
 * Orders by ordering key, then by wire name
 */
export function compareParameters<V>(a: Parameter<V>, b: Parameter<V>): number {
  if (a.order !== b.order) {
    return a.order - b.order;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
