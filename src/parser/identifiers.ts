/**
 * Identifier rules shared by the parser and the registries.
 *
 * A tag identifier starts with a letter or `_`, continues with letters,
 * digits, `_` or `-`, and may not start or end with the reserved `__`
 * sentinel. Hook names additionally allow `.` and `:`.
 */

const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{N}_-]/u;
const HOOK_NAME_PART = /[\p{L}\p{N}_\-.:]/u;

export const RESERVED_SENTINEL = '__';

export function isIdentifierStart(ch: string): boolean {
  return IDENT_START.test(ch);
}

export function isIdentifierPart(ch: string): boolean {
  return IDENT_PART.test(ch);
}

export function hasReservedSentinel(value: string): boolean {
  return value.startsWith(RESERVED_SENTINEL) || value.endsWith(RESERVED_SENTINEL);
}

/**
 * Read the longest identifier starting at `start`.
 * Returns null when `text[start]` cannot begin one. The sentinel rule is not
 * checked here.
 */
export function readIdentifier(text: string, start: number): { name: string; end: number } | null {
  if (start >= text.length || !isIdentifierStart(text[start])) {
    return null;
  }
  let end = start + 1;
  while (end < text.length && isIdentifierPart(text[end])) {
    end++;
  }
  return { name: text.slice(start, end), end };
}

export function isIdentifier(value: string): boolean {
  if (value.length === 0 || hasReservedSentinel(value)) return false;
  const read = readIdentifier(value, 0);
  return read !== null && read.end === value.length;
}

export function isHookName(value: string): boolean {
  if (value.length === 0 || hasReservedSentinel(value)) return false;
  if (!isIdentifierStart(value[0])) return false;
  for (const ch of value.slice(1)) {
    if (!HOOK_NAME_PART.test(ch)) return false;
  }
  return true;
}

/** Human-readable reason an identifier was rejected, or null when it is valid. */
export function describeIdentifierProblem(value: string): string | null {
  if (value.length === 0) return 'identifier cannot be empty';
  if (hasReservedSentinel(value)) return `identifier '${value}' uses the reserved '__' sentinel`;
  if (!isIdentifier(value)) return `invalid identifier '${value}'`;
  return null;
}
