import type { Key } from "./types.js";
import { InvalidKeyError } from "./errors.js";

export const SEPARATOR = " ";

/** Separator plus `a`..`z`. */
export const SLOT_COUNT = 27;

const CODE_A = 97;
const CODE_Z = 122;

function isLetter(code: number): boolean {
  return code >= CODE_A && code <= CODE_Z;
}

/**
 * Folds a raw string into the tree's alphabet:
 * - lowercases
 * - maps every character outside a-z to the separator (runs are kept)
 * - trims leading and trailing separators
 *
 * Every output is traversable, including the empty string.
 */
export function normalizeKey(raw: string): Key {
  const lower = raw.toLowerCase();
  let out = "";
  for (let i = 0; i < lower.length; i++) {
    const code = lower.charCodeAt(i);
    out += isLetter(code) ? lower[i] : SEPARATOR;
  }

  let start = 0;
  let end = out.length;
  while (start < end && out[start] === SEPARATOR) start++;
  while (end > start && out[end - 1] === SEPARATOR) end--;
  return out.slice(start, end);
}

/** Slot of the child whose segment starts with `key`'s first character. */
export function slotIndex(key: Key): number {
  if (key.length === 0) throw new InvalidKeyError(key, "empty segment has no slot");

  const code = key.charCodeAt(0);
  if (key[0] === SEPARATOR) return 0;
  if (isLetter(code)) return code - CODE_A + 1;

  throw new InvalidKeyError(key, `character "${key[0]}" is outside the key alphabet`);
}

export function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a.charCodeAt(i) === b.charCodeAt(i)) i++;
  return i;
}
