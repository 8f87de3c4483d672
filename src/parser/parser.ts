/**
 * Tag Parser
 *
 * Deterministic stack parser for cuemark control tags. A single left-to-right
 * scan reads one token at every `[` and keeps a stack of open containers.
 * Malformed markup fails closed with a ParseError; nothing is skipped or
 * guessed.
 *
 * Syntax:
 *   [action /]                                   single
 *   [tag]content[/tag]                           container
 *   [namespace:action pos key="value" /]         namespaced
 */

import { ParseError } from '../errors.js';
import { hasReservedSentinel, readIdentifier } from './identifiers.js';
import { parseArgs } from './args.js';
import type { ContainerTag, NamespacedTag, ParseOptions, SingleTag, Tag } from './types.js';

// ── Tokens ───────────────────────────────────────────────────────────────────

interface OpenToken {
  kind: 'open';
  name: string;
  start: number;
  contentStart: number;
}

interface CloseToken {
  kind: 'close';
  name: string;
  start: number;
}

type Token = OpenToken | CloseToken | { kind: 'tag'; tag: SingleTag | NamespacedTag };

const EMPTY_PARAMS: readonly string[] = Object.freeze([]);
const EMPTY_ATTRIBUTES: Readonly<Record<string, string>> = Object.freeze({});

function isSpace(ch: string): boolean {
  return /\s/.test(ch);
}

function skipSpace(text: string, cursor: number): number {
  while (cursor < text.length && isSpace(text[cursor])) cursor++;
  return cursor;
}

function readName(text: string, cursor: number, what: string, tokenStart: number): { name: string; end: number } {
  const read = readIdentifier(text, cursor);
  if (!read) {
    throw new ParseError(`Invalid ${what} at index ${tokenStart}`, tokenStart);
  }
  if (hasReservedSentinel(read.name)) {
    throw new ParseError(
      `Invalid ${what} '${read.name}' at index ${tokenStart}: reserved '__' sentinel`,
      tokenStart
    );
  }
  return read;
}

/**
 * Locate the `/]` that closes a namespaced tag, honouring quotes and
 * backslash escapes. A bare `]` is ordinary argument text. Returns the
 * index of the `/`.
 */
function findNamespacedClose(text: string, from: number, tokenStart: number): number {
  let quote: '"' | "'" | null = null;
  let quoteStart = -1;
  let i = from;

  while (i < text.length) {
    const ch = text[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      i++;
      continue;
    }
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      i++;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      quoteStart = i;
      i++;
      continue;
    }
    if (ch === '/' && text[i + 1] === ']') {
      return i;
    }
    i++;
  }

  if (quote !== null) {
    throw new ParseError(
      `Unterminated quote at index ${quoteStart} in namespaced tag at index ${tokenStart}`,
      quoteStart
    );
  }
  throw new ParseError(`Malformed namespaced tag at index ${tokenStart}: missing '/]'`, tokenStart);
}

function makeSingle(action: string, raw: string, start: number): SingleTag {
  const tag: SingleTag = {
    kind: 'single',
    action,
    params: EMPTY_PARAMS,
    attributes: EMPTY_ATTRIBUTES,
    raw,
    start,
    end: start + raw.length,
  };
  return Object.freeze(tag);
}

function makeNamespaced(
  namespace: string,
  action: string,
  params: string[],
  attributes: Record<string, string>,
  raw: string,
  start: number
): NamespacedTag {
  const tag: NamespacedTag = {
    kind: 'namespaced',
    namespace,
    action,
    params: Object.freeze(params),
    attributes: Object.freeze(attributes),
    raw,
    start,
    end: start + raw.length,
  };
  return Object.freeze(tag);
}

function makeContainer(action: string, content: string, raw: string, start: number): ContainerTag {
  const tag: ContainerTag = {
    kind: 'container',
    action,
    content,
    params: EMPTY_PARAMS,
    attributes: EMPTY_ATTRIBUTES,
    raw,
    start,
    end: start + raw.length,
  };
  return Object.freeze(tag);
}

/**
 * Read the token starting at `start` (which must hold `[`).
 * Returns the token and the offset just past it.
 */
function readToken(text: string, start: number): { token: Token; next: number } {
  if (start + 1 >= text.length) {
    throw new ParseError(`Unterminated token at index ${start}`, start);
  }

  // [/name]
  if (text[start + 1] === '/') {
    const { name, end } = readName(text, start + 2, 'close tag', start);
    if (text[end] !== ']') {
      throw new ParseError(`Malformed close tag for '${name}' at index ${start}`, start);
    }
    return { token: { kind: 'close', name, start }, next: end + 1 };
  }

  const first = readName(text, start + 1, 'tag name', start);
  let cursor = first.end;

  // [namespace:action ... /]
  if (text[cursor] === ':') {
    const action = readName(text, cursor + 1, 'namespaced action', start);
    cursor = skipSpace(text, action.end);
    const closeAt = findNamespacedClose(text, cursor, start);
    const argText = text.slice(cursor, closeAt).trim();
    const { attributes, params } = parseArgs(argText, cursor);
    const raw = text.slice(start, closeAt + 2);
    return {
      token: { kind: 'tag', tag: makeNamespaced(first.name, action.name, params, attributes, raw, start) },
      next: closeAt + 2,
    };
  }

  cursor = skipSpace(text, cursor);
  if (cursor >= text.length) {
    throw new ParseError(`Unterminated token at index ${start}`, start);
  }

  // [name /]
  if (text[cursor] === '/') {
    if (text[cursor + 1] !== ']') {
      throw new ParseError(`Malformed self-closing tag '[${first.name}' at index ${start}`, start);
    }
    const raw = text.slice(start, cursor + 2);
    return { token: { kind: 'tag', tag: makeSingle(first.name, raw, start) }, next: cursor + 2 };
  }

  // [name]
  if (text[cursor] !== ']') {
    throw new ParseError(`Malformed token after '${first.name}' at index ${start}`, start);
  }
  return {
    token: { kind: 'open', name: first.name, start, contentStart: cursor + 1 },
    next: cursor + 1,
  };
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Parse every tag in `text`, in source order.
 *
 * Tags inside a container are inert content unless `includeNested` is set.
 *
 * @throws ParseError on any malformed or unbalanced markup.
 */
export function parseAll(text: string, options: ParseOptions = {}): Tag[] {
  const includeNested = options.includeNested === true;
  const tags: Tag[] = [];
  const stack: OpenToken[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    const bracket = text.indexOf('[', cursor);
    if (bracket === -1) break;

    const { token, next } = readToken(text, bracket);

    switch (token.kind) {
      case 'open':
        stack.push(token);
        break;

      case 'close': {
        const open = stack.pop();
        if (!open) {
          throw new ParseError(`Unexpected close tag '[/${token.name}]' at index ${token.start}`, token.start);
        }
        if (open.name !== token.name) {
          throw new ParseError(
            `Unbalanced container: expected '[/${open.name}]' before '[/${token.name}]' at index ${token.start}`,
            token.start
          );
        }
        if (stack.length === 0 || includeNested) {
          tags.push(
            makeContainer(
              open.name,
              text.slice(open.contentStart, token.start),
              text.slice(open.start, next),
              open.start
            )
          );
        }
        break;
      }

      case 'tag':
        if (stack.length === 0 || includeNested) {
          tags.push(token.tag);
        }
        break;
    }

    cursor = next;
  }

  if (stack.length > 0) {
    const unclosed = stack[stack.length - 1];
    throw new ParseError(`Unterminated container tag '[${unclosed.name}]'`, unclosed.start);
  }

  // Containers are emitted at their close marker; restore source order.
  if (includeNested) {
    tags.sort((a, b) => a.start - b.start);
  }
  return tags;
}

/**
 * Parse a string holding exactly one top-level tag (surrounding whitespace
 * is ignored).
 */
export function parseTag(tagText: string): Tag {
  const text = tagText.trim();
  if (!text.startsWith('[') || !text.endsWith(']')) {
    throw new ParseError(`Invalid tag format: ${tagText}`);
  }
  const tags = parseAll(text);
  if (tags.length !== 1 || tags[0].start !== 0 || tags[0].end !== text.length) {
    throw new ParseError(`Tag must contain exactly one control tag: ${tagText}`);
  }
  return tags[0];
}

export function isValidTag(tagText: string): boolean {
  try {
    parseTag(tagText);
    return true;
  } catch {
    return false;
  }
}

/**
 * Strip every top-level tag from `text` and trim the result.
 */
export function removeTags(text: string): string {
  const tags = parseAll(text);
  let result = text;
  for (let i = tags.length - 1; i >= 0; i--) {
    const tag = tags[i];
    result = result.slice(0, tag.start) + result.slice(tag.end);
  }
  return result.trim();
}

export function parseContainerTags(text: string): ContainerTag[] {
  return parseAll(text, { includeNested: true }).filter(
    (tag): tag is ContainerTag => tag.kind === 'container'
  );
}

export function parseSelfClosing(text: string): SingleTag[] {
  return parseAll(text).filter((tag): tag is SingleTag => tag.kind === 'single');
}

export function parseNamespaced(text: string): NamespacedTag[] {
  return parseAll(text, { includeNested: true }).filter(
    (tag): tag is NamespacedTag => tag.kind === 'namespaced'
  );
}
