/**
 * Runtime minor versions and stub directory naming.
 *
 * Stub sets are published per minor version in directories named
 * `rubystubs<major><minor>` (e.g. `rubystubs32` for 3.2). A requested version
 * without its own stub set falls back to the newest supported version below it.
 */

import { VersionParseError } from '../errors/RbstubError.js';

const DIRECTORY_PREFIX = 'rubystubs';

function parseComponent(text: string | undefined, label: string, full: string): number {
  if (text === undefined || !/^\d+$/.test(text)) {
    throw new VersionParseError(`Invalid ${label} version: ${text ?? ''}`, { version: full });
  }
  const value = Number(text);
  if (value > 255) {
    throw new VersionParseError(`Invalid ${label} version: ${text}`, { version: full });
  }
  return value;
}

export class MinorVersion {
  constructor(readonly major: number, readonly minor: number) {}

  /**
   * Parse "MAJOR.MINOR[.PATCH...]"; anything after the minor part is ignored.
   *
   * @throws VersionParseError when there is no minor part or a part is not numeric
   */
  static parse(version: string): MinorVersion {
    const parts = version.split('.');
    if (parts.length < 2) {
      throw new VersionParseError(`Invalid version format: ${version}`, { version });
    }
    return new MinorVersion(
      parseComponent(parts[0], 'major', version),
      parseComponent(parts[1], 'minor', version)
    );
  }

  /**
   * Inverse of toDirectoryName(). Returns null for names that are not stub
   * directories. The first digit is the major version.
   */
  static fromDirectoryName(name: string): MinorVersion | null {
    const match = new RegExp(`^${DIRECTORY_PREFIX}(\\d)(\\d+)$`).exec(name);
    if (!match) {
      return null;
    }
    return new MinorVersion(Number(match[1]), Number(match[2]));
  }

  compare(other: MinorVersion): number {
    return this.major !== other.major ? this.major - other.major : this.minor - other.minor;
  }

  equals(other: MinorVersion): boolean {
    return this.compare(other) === 0;
  }

  isSupported(): boolean {
    return SUPPORTED_VERSIONS.some((v) => v.equals(this));
  }

  /**
   * Exact match when supported, otherwise the highest supported version
   * lower than this one, otherwise null.
   */
  findClosestSupported(): MinorVersion | null {
    let best: MinorVersion | null = null;
    for (const candidate of SUPPORTED_VERSIONS) {
      if (candidate.equals(this)) {
        return candidate;
      }
      if (candidate.compare(this) < 0 && (best === null || candidate.compare(best) > 0)) {
        best = candidate;
      }
    }
    return best;
  }

  toDirectoryName(): string {
    return `${DIRECTORY_PREFIX}${this.major}${this.minor}`;
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }
}

export const SUPPORTED_VERSIONS: readonly MinorVersion[] = [
  [1, 9],
  [2, 0], [2, 1], [2, 2], [2, 3], [2, 4], [2, 5], [2, 6], [2, 7],
  [3, 0], [3, 1], [3, 2], [3, 3], [3, 4],
].map(([major, minor]) => new MinorVersion(major, minor));

export function sortVersions(versions: MinorVersion[]): MinorVersion[] {
  return [...versions].sort((a, b) => a.compare(b));
}
