/**
 * KeyClassifier - decides from a key name alone whether it holds a secret.
 *
 * Exclusion rules run first and always win: `max_token_size` is a setting
 * even though it contains `token`.
 */

import { DEFAULT_KEY_VOCABULARY, type KeyVocabulary } from './vocabulary.js';
import { MatchReason, NOT_SENSITIVE, type Classification } from '../shared/types.js';

export class KeyClassifier {
  private readonly vocabulary: KeyVocabulary;

  constructor(vocabulary: KeyVocabulary = DEFAULT_KEY_VOCABULARY) {
    this.vocabulary = vocabulary;
  }

  /**
   * Classifies a key as written in the document. Quoted and dotted keys
   * (`properties."moesifKey"`) are accepted.
   */
  classify(key: string): Classification {
    const normalized = normalizeKey(key);
    if (normalized.length === 0) return NOT_SENSITIVE;

    if (this.isExcluded(normalized)) return NOT_SENSITIVE;

    // Report the most specific term: `api_key` rather than `key`
    const term = this.vocabulary.sensitiveTerms
      .filter(t => normalized.includes(t))
      .reduce<string | undefined>((best, t) => (best === undefined || t.length > best.length ? t : best), undefined);
    if (term !== undefined) {
      return { sensitive: true, reason: MatchReason.NAME, rule: term };
    }

    const named = this.vocabulary.sensitivePatterns.find(p => p.pattern.test(normalized));
    if (named !== undefined) {
      return { sensitive: true, reason: MatchReason.NAME, rule: named.name };
    }

    return NOT_SENSITIVE;
  }

  /** True if the key, or its last dotted segment, matches an exclusion. */
  isExcluded(normalizedKey: string): boolean {
    const leaf = normalizedKey.slice(normalizedKey.lastIndexOf('.') + 1);
    const candidates = leaf === normalizedKey ? [normalizedKey] : [normalizedKey, leaf];

    return candidates.some(candidate =>
      this.vocabulary.excludedPrefixes.some(prefix => candidate.startsWith(prefix)) ||
      this.vocabulary.excludedSuffixes.some(suffix => candidate.endsWith(suffix))
    );
  }
}

/** Lowercases a key and drops quoting and whitespace around dots. */
export function normalizeKey(key: string): string {
  return key
    .replace(/["']/g, '')
    .replace(/\s*\.\s*/g, '.')
    .trim()
    .toLowerCase();
}

export default KeyClassifier;
