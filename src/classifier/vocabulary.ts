/**
 * Default pattern tables for key and value classification.
 *
 * Tables are frozen; classifiers take them as constructor arguments so a
 * caller can supply its own without touching these.
 */

export interface NamedPattern {
  readonly name: string;
  readonly pattern: RegExp;
}

/** Key-name tables used by KeyClassifier. */
export interface KeyVocabulary {
  /** Substrings that mark a key as sensitive. */
  readonly sensitiveTerms: readonly string[];
  /** Word-shaped patterns, checked after the substring terms. */
  readonly sensitivePatterns: readonly NamedPattern[];
  /** Key prefixes meaning "a setting, not a secret". */
  readonly excludedPrefixes: readonly string[];
  /** Key suffixes meaning "a setting, not a secret". */
  readonly excludedSuffixes: readonly string[];
}

/** Value-shape tables used by ValuePatternMatcher. */
export interface ValueVocabulary {
  /** Leading characters of a base64url-encoded JWT header. */
  readonly jwtPrefix: string;
  readonly base64MinLength: number;
  /** Prefixes issued by known secret-key providers. */
  readonly secretKeyPrefixes: readonly string[];
  readonly apiKeyMinLength: number;
}

export const DEFAULT_KEY_VOCABULARY: KeyVocabulary = Object.freeze({
  sensitiveTerms: Object.freeze([
    'password',
    'passwd',
    'pwd',
    'key',
    'apikey',
    'api_key',
    'secret',
    'auth_token',
    'access_token',
    'refresh_token',
    'bearer_token',
    'credential',
    'credentials',
    'key_password',
    'moesifkey',
    'embedding_endpoint_key',
  ]),
  sensitivePatterns: Object.freeze([
    { name: 'token', pattern: /\btoken\b/ },
    { name: '_token', pattern: /_token$/ },
    { name: 'token_', pattern: /^token_/ },
  ]),
  excludedPrefixes: Object.freeze([
    // toggles
    'allow_',
    'enable_',
    'disable_',
    'show_',
    'display_',
    'retain_',
    'is_',
    'has_',
    // bounds
    'max_',
    'min_',
  ]),
  excludedSuffixes: Object.freeze([
    // durations
    '_time',
    '_timeout',
    '_ttl',
    '_period',
    '_validity_period',
    '_expiry',
    '_interval',
    // sizes and counts
    '_size',
    '_pool_size',
    '_count',
    '_limit',
    '_length',
    '_threads',
  ]),
});

export const DEFAULT_VALUE_VOCABULARY: ValueVocabulary = Object.freeze({
  jwtPrefix: 'eyJ',
  base64MinLength: 40,
  secretKeyPrefixes: Object.freeze([
    'sk-',
    'sk_live_',
    'rk_live_',
    'pk_live_',
    'ghp_',
    'gho_',
    'github_pat_',
    'glpat-',
    'xoxb-',
    'xoxp-',
    'AKIA',
  ]),
  apiKeyMinLength: 20,
});
