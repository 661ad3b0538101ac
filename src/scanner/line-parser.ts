/**
 * Single-line structure recognition for TOML-like documents.
 *
 * No state crosses line boundaries. Anything these functions do not
 * recognise is reported as null and left to pass through unchanged.
 */

import type { Span } from '../shared/types.js';

/** A `key = value` pair found on one line. */
export interface ParsedPair {
  /** Key as written, trimmed. */
  key: string;
  /** Value content without delimiting quotes. */
  value: string;
  /** Position of the value content, offset into the full line. */
  valueSpan: Span;
  quote: '"' | "'" | null;
}

export interface ParsedHeader {
  name: string;
  isTableArray: boolean;
}

const KEY_SEGMENT = `(?:[A-Za-z0-9_-]+|"(?:[^"\\\\]|\\\\.)*"|'[^']*')`;
const KEY = new RegExp(`^${KEY_SEGMENT}(?:[ \\t]*\\.[ \\t]*${KEY_SEGMENT})*$`);
// Names open with a letter, `_` or a quote so rows like `[1]` inside a
// multi-line array are not taken for headers
const SECTION_NAME = `[A-Za-z_"'][A-Za-z0-9_\\-."' \\t]*?`;
const SECTION = new RegExp(`^[ \\t]*\\[[ \\t]*(${SECTION_NAME})[ \\t]*\\][ \\t]*(?:#.*)?$`);
const TABLE_ARRAY = new RegExp(`^[ \\t]*\\[\\[[ \\t]*(${SECTION_NAME})[ \\t]*\\]\\][ \\t]*(?:#.*)?$`);
const TRAILER = /^[ \t]*(?:#.*)?$/;

/** Recognises `[name]` and `[[name]]` header lines. */
export function parseHeader(line: string): ParsedHeader | null {
  const tableArray = TABLE_ARRAY.exec(line);
  if (tableArray?.[1] !== undefined) {
    return { name: tableArray[1], isTableArray: true };
  }

  const section = SECTION.exec(line);
  if (section?.[1] !== undefined) {
    return { name: section[1], isTableArray: false };
  }

  return null;
}

/** True when the first non-blank character is `#`. */
export function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith('#');
}

/**
 * Parses `key = value` from `text`. Spans are shifted by `offset` so that a
 * caller parsing the tail of a line (after a `#`) gets positions into the
 * whole line.
 */
export function parseKeyValue(text: string, offset = 0): ParsedPair | null {
  const eq = findAssignment(text);
  if (eq === -1) return null;

  const key = text.slice(0, eq).trim();
  if (!KEY.test(key)) return null;

  const valueStart = eq + 1;
  const rest = text.slice(valueStart);
  const lead = rest.search(/[^ \t]/);

  if (lead === -1) {
    const end = offset + text.length;
    return { key, value: '', valueSpan: { start: end, end }, quote: null };
  }

  const first = rest.charAt(lead);

  if (first === '"' || first === "'") {
    // Multi-line strings are not followed across lines
    if (rest.startsWith(first.repeat(3), lead)) return null;

    const close = findClosingQuote(rest, lead + 1, first);
    if (close === -1) return null;
    if (!TRAILER.test(rest.slice(close + 1))) return null;

    const start = offset + valueStart + lead + 1;
    return {
      key,
      value: rest.slice(lead + 1, close),
      valueSpan: { start, end: start + (close - lead - 1) },
      quote: first,
    };
  }

  // Arrays and inline tables
  if (first === '[' || first === '{') return null;

  const hash = rest.indexOf('#', lead);
  const token = rest.slice(lead, hash === -1 ? rest.length : hash).trimEnd();
  if (/["']/.test(token)) return null;

  const start = offset + valueStart + lead;
  return { key, value: token, valueSpan: { start, end: start + token.length }, quote: null };
}

/** Index of the first `=` outside quotes, or -1. */
function findAssignment(text: string): number {
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quote !== null) {
      if (quote === '"' && ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#') {
      return -1;
    } else if (ch === '=') {
      return i;
    }
  }

  return -1;
}

/** Index of the closing quote, honouring backslash escapes in basic strings. */
function findClosingQuote(text: string, from: number, quote: string): number {
  for (let i = from; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote === '"' && ch === '\\') {
      i++;
    } else if (ch === quote) {
      return i;
    }
  }
  return -1;
}
