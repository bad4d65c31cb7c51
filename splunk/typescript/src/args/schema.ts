/**
 * Parameter-holder schemas
 * @module splunk-client/args/schema
 */

import { ConfigError, SerializationError } from '../errors/index.js';
import { Argument } from './argument.js';
import { compareParameters, type Parameter, type ParameterDeclaration } from './parameter.js';

/**
 * One declaration per holder property
 */
export type ArgsTable<V> = {
  readonly [K in keyof V]-?: ParameterDeclaration<NonNullable<V[K]>>;
};

export const NO_ARGUMENTS: readonly Argument[] = Object.freeze([]);

/**
 * Serializes holders of one type into ordered arguments
 *
 * Declarations are checked when the schema is defined. The sorted parameter
 * list is built on first use and shared by every holder afterwards.
 */
export class ArgsSchema<V extends object> {
  private cached: readonly Parameter<V>[] | undefined;

  constructor(
    readonly typeName: string,
    private readonly table: ArgsTable<V>
  ) {
    const seen = new Set<string>();
    for (const field in table) {
      const declaration = table[field];
      validateDeclaration(typeName, field, declaration);
      const ordinal = `${declaration.order}\u0000${declaration.name}`;
      if (seen.has(ordinal)) {
        throw ConfigError.duplicateParameter(typeName, declaration.order, declaration.name);
      }
      seen.add(ordinal);
    }
  }

  /**
   * Parameters in serialization order
   */
  get parameters(): readonly Parameter<V>[] {
    this.cached ??= this.buildParameters();
    return this.cached;
  }

  /**
   * New holder with every non-null default filled in, then `init` applied
   */
  create(init: Partial<V> = {}): Partial<V> {
    const values: Partial<V> = {};
    for (const field in this.table) {
      applyDefault(values, field, this.table[field]);
    }
    return Object.assign(values, init);
  }

  /**
   * Arguments for a holder, in parameter order
   *
   * Absent values are skipped, as are values equal to their default unless
   * the parameter emits defaults. A collection yields one argument per item.
   *
   * @throws SerializationError when a required value is absent or a value
   * is outside its declared type
   */
  enumerate(values: Partial<V>): readonly Argument[] {
    const args: Argument[] = [];

    for (const parameter of this.parameters) {
      const value = parameter.read(values);

      if (value === undefined || value === null) {
        if (parameter.required) {
          throw SerializationError.missingRequiredParameter(parameter.name, this.typeName);
        }
        continue;
      }

      if (!parameter.isCollection && !parameter.emitDefault && value === parameter.defaultValue) {
        continue;
      }

      for (const text of parameter.format(value)) {
        args.push(new Argument(parameter.name, text));
      }
    }

    return Object.freeze(args);
  }

  /**
   * `name=value; ...` for every parameter, with `null` for absent values
   */
  describe(values: Partial<V>): string {
    const parts: string[] = [];

    for (const parameter of this.parameters) {
      const value = parameter.read(values);
      if (value === undefined || value === null) {
        parts.push(`${parameter.name}=null`);
        continue;
      }
      for (const text of parameter.format(value)) {
        parts.push(`${parameter.name}=${text}`);
      }
    }

    return parts.join('; ');
  }

  private buildParameters(): readonly Parameter<V>[] {
    const parameters: Parameter<V>[] = [];
    for (const field in this.table) {
      parameters.push(bindParameter(this.typeName, field, this.table[field]));
    }
    return Object.freeze(parameters.sort(compareParameters));
  }
}

/**
 * Registers a parameter-holder type
 *
 * @throws ConfigError when a declaration lacks a wire name or an integral
 * ordering key, two declarations share `(order, name)`, or a list nests
 * another list
 *
 * @example
 * ```typescript
 * const PagingArgs = defineArgs<{ count?: number; offset?: number }>('PagingArgs', {
 *   count: parameter(ArgTypes.integer, { name: 'count', order: 0, defaultValue: 30 }),
 *   offset: parameter(ArgTypes.integer, { name: 'offset', order: 1, defaultValue: 0 }),
 * });
 * PagingArgs.enumerate(PagingArgs.create({ offset: 60 })); // [offset=60]
 * ```
 */
export function defineArgs<V extends object>(typeName: string, table: ArgsTable<V>): ArgsSchema<V> {
  return new ArgsSchema(typeName, table);
}

function validateDeclaration<T>(typeName: string, field: string, declaration: ParameterDeclaration<T>): void {
  if (typeof declaration.name !== 'string' || declaration.name.trim().length === 0) {
    throw ConfigError.missingParameterName(typeName, field);
  }
  if (!Number.isInteger(declaration.order)) {
    throw ConfigError.missingParameterOrder(typeName, field);
  }
  const { type } = declaration;
  if (type.kind === 'list' && type.itemType?.kind === 'list') {
    throw ConfigError.unsupportedParameterType(typeName, field, type.typeName);
  }
}

function applyDefault<V, K extends keyof V>(
  values: Partial<V>,
  field: K,
  declaration: ParameterDeclaration<NonNullable<V[K]>>
): void {
  const { defaultValue } = declaration;
  if (defaultValue !== undefined && defaultValue !== null) {
    values[field] = defaultValue;
  }
}

function bindParameter<V, K extends Extract<keyof V, string>>(
  typeName: string,
  field: K,
  declaration: ParameterDeclaration<NonNullable<V[K]>>
): Parameter<V> {
  const { type } = declaration;

  return Object.freeze({
    name: declaration.name,
    order: declaration.order,
    field,
    defaultValue: declaration.defaultValue ?? null,
    emitDefault: declaration.emitDefault ?? false,
    required: declaration.required ?? false,
    isCollection: type.kind === 'list',
    read: (values: Partial<V>): unknown => values[field],
    format(value: unknown): readonly string[] {
      if (!type.is(value)) {
        throw SerializationError.invalidValue(typeName, field, value, type.typeName);
      }
      return type.format(value);
    },
  });
}
