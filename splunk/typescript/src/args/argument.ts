/**
 * Wire-level request arguments
 * @module splunk-client/args/argument
 */

/**
 * One serialized `(name, value)` pair
 */
export class Argument {
  constructor(
    readonly name: string,
    readonly value: string
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return `${this.name}=${this.value}`;
  }
}

/**
 * Encodes argument sequences for a query string or a form body;
 * multi-valued arguments repeat their name
 */
export function toSearchParams(...sequences: readonly Iterable<Argument>[]): URLSearchParams {
  const params = new URLSearchParams();
  for (const sequence of sequences) {
    for (const argument of sequence) {
      params.append(argument.name, argument.value);
    }
  }
  return params;
}
