/**
 * ValuePatternMatcher - decides from a value alone whether it looks like
 * a secret.
 *
 * Rules:
 * - jwt: starts with the base64url encoding of `{"`
 * - base64: a long run of the base64 alphabet, with optional padding
 * - api-key: a known provider prefix, or a long mixed alphanumeric token
 *
 * Empty values, variable references, booleans and numbers never match.
 */

import { DEFAULT_VALUE_VOCABULARY, type ValueVocabulary } from './vocabulary.js';
import {
  MatchReason,
  NOT_SENSITIVE,
  ValueRule,
  type Classification,
} from '../shared/types.js';

const BASE64_BLOB = /^[A-Za-z0-9+/]+={0,2}$/;
const ALPHANUMERIC = /^[A-Za-z0-9]+$/;
const VARIABLE_REFERENCE = /^\$(\{[^}]*\}|[A-Za-z_])/;
const BOOLEAN = /^(true|false)$/i;
const NUMBER =
  /^[+-]?((\d[\d_]*)(\.\d[\d_]*)?([eE][+-]?\d[\d_]*)?|0x[0-9a-fA-F_]+|0o[0-7_]+|0b[01_]+|inf|nan)$/;

export class ValuePatternMatcher {
  private readonly vocabulary: ValueVocabulary;

  constructor(vocabulary: ValueVocabulary = DEFAULT_VALUE_VOCABULARY) {
    this.vocabulary = vocabulary;
  }

  classify(value: string): Classification {
    const content = stripQuotes(value.trim());
    if (isInert(content)) return NOT_SENSITIVE;

    const rule = this.matchRule(content);
    if (rule === null) return NOT_SENSITIVE;

    return { sensitive: true, reason: MatchReason.VALUE, rule };
  }

  /** Returns the first value rule the content satisfies. */
  private matchRule(content: string): ValueRule | null {
    const { jwtPrefix, base64MinLength, secretKeyPrefixes, apiKeyMinLength } = this.vocabulary;

    if (content.startsWith(jwtPrefix)) {
      return ValueRule.JWT;
    }

    if (content.length >= base64MinLength && BASE64_BLOB.test(content)) {
      return ValueRule.BASE64;
    }

    if (secretKeyPrefixes.some(prefix => content.startsWith(prefix))) {
      return ValueRule.API_KEY;
    }

    if (content.length >= apiKeyMinLength && ALPHANUMERIC.test(content) && isMixed(content)) {
      return ValueRule.API_KEY;
    }

    return null;
  }
}

/** Removes one pair of matching surrounding quotes. */
export function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function isInert(content: string): boolean {
  return (
    content.length === 0 ||
    VARIABLE_REFERENCE.test(content) ||
    BOOLEAN.test(content) ||
    NUMBER.test(content)
  );
}

/** Letters mixed with digits, or upper case mixed with lower case. */
function isMixed(content: string): boolean {
  const hasDigit = /\d/.test(content);
  const hasLower = /[a-z]/.test(content);
  const hasUpper = /[A-Z]/.test(content);
  return (hasDigit && (hasLower || hasUpper)) || (hasLower && hasUpper);
}

export default ValuePatternMatcher;
