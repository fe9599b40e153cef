/**
 * String utilities
 */

import { randomBytes } from "node:crypto";

/**
 * Truncate a string to a maximum length, adding ellipsis if needed
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + "...";
}

/**
 * Random lowercase hex string of `length` characters
 */
export function randomHex(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString("hex").substring(0, length);
}

/**
 * Short form of a commit hash for display
 */
export function shortHash(hash: string): string {
  return hash.substring(0, 7);
}
