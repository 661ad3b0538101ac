/**
 * Classifier Module - Public API
 *
 * Key-name and value-shape classification.
 */

export { KeyClassifier, normalizeKey } from './key-classifier.js';
export { ValuePatternMatcher, stripQuotes } from './value-pattern-matcher.js';
export { DEFAULT_KEY_VOCABULARY, DEFAULT_VALUE_VOCABULARY } from './vocabulary.js';
export type { KeyVocabulary, ValueVocabulary, NamedPattern } from './vocabulary.js';
