/**
 * Shared Types
 *
 * Records produced by the line scanner and consumed by the redactor.
 */

// ═══════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════

/** Which check flagged a key/value pair. */
export enum MatchReason {
  NAME = 'name',
  VALUE = 'value',
  NONE = 'none',
}

/** Value-shape rules recognised by the value matcher. */
export enum ValueRule {
  JWT = 'jwt',
  BASE64 = 'base64',
  API_KEY = 'api-key',
}

/** Structural kind of a scanned line. */
export type LineKind =
  | 'blank'
  | 'comment'
  | 'section'
  | 'tableArray'
  | 'keyValue'
  | 'other';

// ═══════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════

/** Outcome of a key or value classification. */
export interface Classification {
  sensitive: boolean;
  reason: MatchReason;
  /** Vocabulary term or value rule that matched. */
  rule: string | null;
}

export const NOT_SENSITIVE: Classification = Object.freeze({
  sensitive: false,
  reason: MatchReason.NONE,
  rule: null,
});

// ═══════════════════════════════════════════════════════════════
// SCAN RECORDS
// ═══════════════════════════════════════════════════════════════

/** Half-open character range into a line's raw text. */
export interface Span {
  start: number;
  end: number;
}

/** One record per input line. */
export interface LineRecord {
  /** 1-based line number. */
  lineNumber: number;
  /** Line text without its terminator. */
  raw: string;
  /** '\n', '\r\n', or '' for an unterminated last line. */
  terminator: string;
  kind: LineKind;
  /** Section in effect for this line (null at top level). */
  section: string | null;
  isComment: boolean;
  /** Key text as written. */
  key: string | null;
  /** Value content with delimiting quotes removed. */
  value: string | null;
  /** Where the value content sits in `raw`. */
  valueSpan: Span | null;
  sensitive: boolean;
  reason: MatchReason;
  rule: string | null;
}

/** Report entry for a sensitive line. */
export interface Finding {
  lineNumber: number;
  section: string | null;
  key: string;
  reason: MatchReason;
  rule: string | null;
}

/** Output of a scan: every line plus the findings derived from them. */
export interface ScanResult {
  records: readonly LineRecord[];
  findings: readonly Finding[];
}

/** Output of a render. */
export interface RenderResult {
  redactedText: string;
  findings: readonly Finding[];
  /** Number of values replaced in `redactedText`. */
  redactedCount: number;
}
