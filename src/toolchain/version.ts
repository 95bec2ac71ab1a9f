/**
 * Minimal version handling for toolchain requirements.
 * Constraints are minimums ("11", "11.0", ">=11.0.1") or a rustup channel.
 */

import { isToolchainChannel } from '../models/index.js';

export type Version = readonly [number, number, number];

export function parseVersion(text: string): Version | null {
  const match = /(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(text);
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0)];
}

export function compareVersions(a: Version, b: Version): number {
  const [aMajor, aMinor, aPatch] = a;
  const [bMajor, bMinor, bPatch] = b;
  return aMajor - bMajor || aMinor - bMinor || aPatch - bPatch;
}

export function minimumOf(constraint: string): Version | null {
  return parseVersion(constraint.replace(/^>=\s*/, ''));
}

export function majorOf(constraint: string | undefined): number | undefined {
  if (constraint === undefined) {
    return undefined;
  }
  return minimumOf(constraint)?.[0];
}

/**
 * True when `installed` meets the constraint. A tool whose version cannot be
 * read only satisfies an unconstrained requirement. A channel constraint is
 * met by any readable version, since the channel is selected, not compared.
 */
export function satisfiesMinimum(installed: string | null, constraint: string | undefined): boolean {
  if (constraint === undefined) {
    return true;
  }
  if (isToolchainChannel(constraint)) {
    return installed !== null;
  }
  const minimum = minimumOf(constraint);
  const actual = installed === null ? null : parseVersion(installed);
  if (!minimum || !actual) {
    return false;
  }
  return compareVersions(actual, minimum) >= 0;
}
