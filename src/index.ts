/**
 * TOML Redactor - Main Entry Point
 *
 * Exports the scan/render pipeline and its building blocks.
 */

import { LineScanner } from './scanner/line-scanner.js';
import { Redactor } from './redactor/redactor.js';
import { DEFAULT_CONFIG, createConfig, type RedactorConfig, type RedactorOptions } from './shared/config.js';
import type { RenderResult, ScanResult } from './shared/types.js';

const defaultScanner = new LineScanner();
const defaultRedactor = new Redactor();

/**
 * Scans a document and classifies every line.
 * @throws RedactorError when the configuration is invalid
 */
export function scan(documentText: string, config: RedactorConfig = DEFAULT_CONFIG): ScanResult {
  return defaultScanner.scan(documentText, config);
}

/**
 * Produces redacted text and findings from a scan.
 * @throws RedactorError when the configuration is invalid
 */
export function render(scanResult: ScanResult, config: RedactorConfig = DEFAULT_CONFIG): RenderResult {
  return defaultRedactor.render(scanResult, config);
}

/** Scan and render in one call. */
export function redact(documentText: string, options: RedactorOptions = {}): RenderResult {
  const config = createConfig(options);
  return render(scan(documentText, config), config);
}

// Classifier Module
export {
  KeyClassifier,
  ValuePatternMatcher,
  normalizeKey,
  stripQuotes,
  DEFAULT_KEY_VOCABULARY,
  DEFAULT_VALUE_VOCABULARY,
} from './classifier/index.js';
export type { KeyVocabulary, ValueVocabulary, NamedPattern } from './classifier/index.js';

// Scanner Module
export { LineScanner, splitLines, parseHeader, parseKeyValue, isCommentLine } from './scanner/index.js';
export type { LineScannerOptions, SourceLine, ParsedPair, ParsedHeader } from './scanner/index.js';

// Redactor Module
export { Redactor, redactLine, formatReport, formatJsonReport, toJsonReport, NO_FINDINGS_MESSAGE } from './redactor/index.js';
export type { ReportOptions, JsonReport } from './redactor/index.js';

// Files Module
export { FileRedactor, BACKUP_SUFFIX } from './files/index.js';
export type { FileRedactionOptions, FileRedactionResult } from './files/index.js';

// Shared
export { DEFAULT_CONFIG, DEFAULT_REDACTION_MARKER, createConfig, validateConfig } from './shared/config.js';
export type { RedactorConfig, RedactorOptions } from './shared/config.js';
export { RedactorError, RedactorErrorCode, isRedactorError } from './shared/errors.js';
export { MatchReason, ValueRule, NOT_SENSITIVE } from './shared/types.js';
export type {
  Classification,
  Finding,
  LineKind,
  LineRecord,
  RenderResult,
  ScanResult,
  Span,
} from './shared/types.js';

// Version
export const VERSION = '0.1.0';
