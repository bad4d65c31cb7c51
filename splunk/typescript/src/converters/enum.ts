/**
 * Enumeration converter with wire-name aliases
 * @module splunk-client/converters/enum
 */

import { FormatError } from '../errors/index.js';
import type { ValueConverter } from './types.js';

/**
 * A TypeScript `enum` object, string or numeric
 */
export type EnumObject = Record<string, string | number>;

export type EnumValue<E extends EnumObject> = E[keyof E];

/**
 * Alternate wire names keyed by member name
 */
export type EnumAliases<E extends EnumObject> = Partial<Record<Extract<keyof E, string>, string>>;

export interface EnumMember<E extends EnumObject> {
  readonly key: Extract<keyof E, string>;
  readonly value: EnumValue<E>;

  /**
   * Name sent on the wire: the alias, else the value of a string member,
   * else the member name
   */
  readonly wireName: string;
}

/**
 * Declared members of an enum object, without the reverse mappings of
 * numeric enums
 */
export function enumMembers<E extends EnumObject>(
  enumObject: E,
  aliases: EnumAliases<E> = {}
): readonly EnumMember<E>[] {
  const members: EnumMember<E>[] = [];
  for (const key in enumObject) {
    if (!Object.prototype.hasOwnProperty.call(enumObject, key) || /^\d+$/.test(key)) {
      continue;
    }
    const value = enumObject[key];
    const alias = aliases[key];
    members.push({
      key,
      value,
      wireName: alias ?? (typeof value === 'string' ? value : key),
    });
  }
  return Object.freeze(members);
}

export class EnumConverter<E extends EnumObject> implements ValueConverter<EnumValue<E>> {
  private readonly exact = new Map<string, EnumValue<E>>();
  private readonly folded = new Map<string, EnumValue<E>>();

  private constructor(
    readonly typeName: string,
    readonly members: readonly EnumMember<E>[]
  ) {
    for (const member of members) {
      this.exact.set(member.wireName, member.value);
    }
    for (const member of members) {
      for (const name of [member.key, String(member.value), member.wireName]) {
        const key = name.toLowerCase();
        if (!this.folded.has(key)) {
          this.folded.set(key, member.value);
        }
      }
    }
  }

  /**
   * Matches the wire name (alias or value) exactly, then member names and
   * values ignoring case
   */
  static create<E extends EnumObject>(
    typeName: string,
    enumObject: E,
    aliases?: EnumAliases<E>
  ): EnumConverter<E> {
    return new EnumConverter(typeName, enumMembers(enumObject, aliases));
  }

  convert(text: string, field?: string): EnumValue<E> {
    const trimmed = text.trim();
    const value = this.exact.get(trimmed) ?? this.folded.get(trimmed.toLowerCase());
    if (value === undefined) {
      throw FormatError.unmappedEnum(this.typeName, text, field);
    }
    return value;
  }

  /**
   * Wire name of a member value, or `undefined` for values outside the enum
   */
  wireNameOf(value: unknown): string | undefined {
    return this.members.find((member) => member.value === value)?.wireName;
  }
}
