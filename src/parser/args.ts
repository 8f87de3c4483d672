/**
 * Argument text of namespaced tags.
 *
 * `splitArgs` tokenizes with POSIX shell rules; `classifyArgs` turns the
 * tokens into attributes (`key=value`) and positional params.
 */

import { ParseError } from '../errors.js';
import { describeIdentifierProblem } from './identifiers.js';

const WHITESPACE = new Set([' ', '\t', '\r', '\n']);

/**
 * Split `text` into shell-style tokens.
 *
 * - single quotes are literal
 * - inside double quotes a backslash escapes only `"` and `\`
 * - outside quotes a backslash escapes any character
 * - `""` yields an empty token
 *
 * @param baseOffset - offset of `text` in the full source, for error messages
 */
export function splitArgs(text: string, baseOffset = 0): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (WHITESPACE.has(ch)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      i++;
      continue;
    }

    inToken = true;

    if (ch === '\\') {
      if (i + 1 >= text.length) {
        throw new ParseError(`Dangling escape at index ${baseOffset + i}`, baseOffset + i);
      }
      current += text[i + 1];
      i += 2;
      continue;
    }

    if (ch === "'") {
      const close = text.indexOf("'", i + 1);
      if (close === -1) {
        throw new ParseError(`Unterminated quote at index ${baseOffset + i}`, baseOffset + i);
      }
      current += text.slice(i + 1, close);
      i = close + 1;
      continue;
    }

    if (ch === '"') {
      const open = i;
      i++;
      let closed = false;
      while (i < text.length) {
        const inner = text[i];
        if (inner === '\\' && i + 1 < text.length && (text[i + 1] === '"' || text[i + 1] === '\\')) {
          current += text[i + 1];
          i += 2;
          continue;
        }
        if (inner === '"') {
          closed = true;
          i++;
          break;
        }
        current += inner;
        i++;
      }
      if (!closed) {
        throw new ParseError(`Unterminated quote at index ${baseOffset + open}`, baseOffset + open);
      }
      continue;
    }

    current += ch;
    i++;
  }

  if (inToken) tokens.push(current);
  return tokens;
}

export interface ClassifiedArgs {
  attributes: Record<string, string>;
  params: string[];
}

/**
 * Sort tokens into attributes and positional params, in source order.
 * A token holding `=` must have a valid identifier before the first `=`.
 */
export function classifyArgs(tokens: readonly string[], baseOffset = 0): ClassifiedArgs {
  const attributes: Record<string, string> = {};
  const params: string[] = [];

  for (const token of tokens) {
    const eq = token.indexOf('=');
    if (eq === -1) {
      params.push(token);
      continue;
    }
    const key = token.slice(0, eq);
    if (key.length === 0) {
      throw new ParseError(`Invalid attribute token '${token}' near index ${baseOffset}`, baseOffset);
    }
    const problem = describeIdentifierProblem(key);
    if (problem) {
      throw new ParseError(`Invalid attribute key near index ${baseOffset}: ${problem}`, baseOffset);
    }
    if (Object.prototype.hasOwnProperty.call(attributes, key)) {
      throw new ParseError(`Duplicate attribute '${key}' near index ${baseOffset}`, baseOffset);
    }
    attributes[key] = token.slice(eq + 1);
  }

  return { attributes, params };
}

export function parseArgs(text: string, baseOffset = 0): ClassifiedArgs {
  if (text.length === 0) return { attributes: {}, params: [] };
  return classifyArgs(splitArgs(text, baseOffset), baseOffset);
}
