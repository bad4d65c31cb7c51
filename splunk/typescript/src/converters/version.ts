/**
 * Dotted version numbers
 * @module splunk-client/converters/version
 */

import { FormatError } from '../errors/index.js';
import type { ValueConverter } from './types.js';

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

/**
 * A version such as `6.1.3` or `6.0.0.182037`
 */
export class Version {
  constructor(
    readonly major: number,
    readonly minor: number,
    readonly build?: number,
    readonly revision?: number
  ) {
    Object.freeze(this);
  }

  /**
   * Orders versions component by component; an absent component sorts first
   */
  compareTo(other: Version): number {
    const mine = [this.major, this.minor, this.build ?? -1, this.revision ?? -1];
    const theirs = [other.major, other.minor, other.build ?? -1, other.revision ?? -1];
    for (let i = 0; i < mine.length; i++) {
      const delta = (mine[i] ?? -1) - (theirs[i] ?? -1);
      if (delta !== 0) {
        return Math.sign(delta);
      }
    }
    return 0;
  }

  equals(other: Version): boolean {
    return this.compareTo(other) === 0;
  }

  toString(): string {
    return [this.major, this.minor, this.build, this.revision]
      .filter((part): part is number => part !== undefined)
      .join('.');
  }
}

export const versionConverter: ValueConverter<Version> = {
  typeName: 'version',
  convert(text, field) {
    const match = VERSION_PATTERN.exec(text.trim());
    if (!match) {
      throw FormatError.conversionFailed('version', text, field);
    }
    const [, major, minor, build, revision] = match;
    return new Version(
      Number(major),
      Number(minor),
      build === undefined ? undefined : Number(build),
      revision === undefined ? undefined : Number(revision)
    );
  },
};
