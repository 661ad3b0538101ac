/**
 * Scanner Module - Public API
 *
 * Turns a document into one classified record per line.
 */

export { LineScanner, splitLines, default } from './line-scanner.js';
export type { LineScannerOptions, SourceLine } from './line-scanner.js';
export { parseHeader, parseKeyValue, isCommentLine } from './line-parser.js';
export type { ParsedPair, ParsedHeader } from './line-parser.js';
