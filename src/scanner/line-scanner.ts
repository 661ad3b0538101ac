/**
 * LineScanner - walks a TOML-like document line by line and classifies
 * every key/value pair.
 *
 * State is limited to the current section. Each line is decided on its
 * own: no lookahead, no multi-line constructs.
 *
 * Usage:
 *   const scanner = new LineScanner();
 *   const result = scanner.scan(text, createConfig({ checkValues: false }));
 *   for (const finding of result.findings) { ... }
 */

import { KeyClassifier } from '../classifier/key-classifier.js';
import { ValuePatternMatcher } from '../classifier/value-pattern-matcher.js';
import { DEFAULT_CONFIG, validateConfig, type RedactorConfig } from '../shared/config.js';
import {
  NOT_SENSITIVE,
  type Classification,
  type Finding,
  type LineRecord,
  type ScanResult,
} from '../shared/types.js';
import { isCommentLine, parseHeader, parseKeyValue, type ParsedPair } from './line-parser.js';

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

/** Classifier overrides for a scanner instance. */
export interface LineScannerOptions {
  keyClassifier?: KeyClassifier;
  valueMatcher?: ValuePatternMatcher;
}

/** A line split from its terminator. */
export interface SourceLine {
  raw: string;
  terminator: string;
}

const BYTE_ORDER_MARK = '\uFEFF';

// ═══════════════════════════════════════════════════════════════
// LINE SCANNER
// ═══════════════════════════════════════════════════════════════

export class LineScanner {
  private readonly keyClassifier: KeyClassifier;
  private readonly valueMatcher: ValuePatternMatcher;

  constructor(options: LineScannerOptions = {}) {
    this.keyClassifier = options.keyClassifier ?? new KeyClassifier();
    this.valueMatcher = options.valueMatcher ?? new ValuePatternMatcher();
  }

  /**
   * Scans a document. Never fails on content; unrecognised lines become
   * `other` records.
   * @throws RedactorError when the configuration is invalid
   */
  scan(text: string, config: RedactorConfig = DEFAULT_CONFIG): ScanResult {
    validateConfig(config);

    const records: LineRecord[] = [];
    let section: string | null = null;

    splitLines(text).forEach((line, index) => {
      const record = this.scanLine(line, index + 1, section, config);
      section = record.section;
      records.push(record);
    });

    const findings = records.filter(r => r.sensitive).map(toFinding);

    return Object.freeze({
      records: Object.freeze(records),
      findings: Object.freeze(findings),
    });
  }

  /** Classifies a parsed pair: name first, then value shape. */
  classifyPair(key: string, value: string, config: RedactorConfig): Classification {
    if (value.length === 0) return NOT_SENSITIVE;

    const byName = this.keyClassifier.classify(key);
    if (byName.sensitive) return byName;

    if (!config.checkValues) return NOT_SENSITIVE;
    return this.valueMatcher.classify(value);
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private scanLine(
    line: SourceLine,
    lineNumber: number,
    section: string | null,
    config: RedactorConfig
  ): LineRecord {
    const base = { lineNumber, raw: line.raw, terminator: line.terminator };

    // A byte-order mark is skipped for parsing only; raw keeps it
    const bom = lineNumber === 1 && line.raw.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK.length : 0;
    const text = line.raw.slice(bom);

    if (text.trim().length === 0) {
      return plainRecord({ ...base, kind: 'blank', section });
    }

    const header = parseHeader(text);
    if (header !== null) {
      return plainRecord({
        ...base,
        kind: header.isTableArray ? 'tableArray' : 'section',
        section: header.name,
      });
    }

    if (isCommentLine(text)) {
      if (!config.includeComments) {
        return plainRecord({ ...base, kind: 'comment', section, isComment: true });
      }

      const hash = text.indexOf('#');
      const pair = parseKeyValue(text.slice(hash + 1), bom + hash + 1);
      if (pair === null) {
        return plainRecord({ ...base, kind: 'comment', section, isComment: true });
      }
      return this.pairRecord({ ...base, kind: 'comment', section, isComment: true }, pair, config);
    }

    const pair = parseKeyValue(text, bom);
    if (pair === null) {
      return plainRecord({ ...base, kind: 'other', section });
    }
    return this.pairRecord({ ...base, kind: 'keyValue', section, isComment: false }, pair, config);
  }

  private pairRecord(
    base: Pick<LineRecord, 'lineNumber' | 'raw' | 'terminator' | 'kind' | 'section' | 'isComment'>,
    pair: ParsedPair,
    config: RedactorConfig
  ): LineRecord {
    const classification = this.classifyPair(pair.key, pair.value, config);

    return Object.freeze({
      ...base,
      key: pair.key,
      value: pair.value,
      valueSpan: Object.freeze({ ...pair.valueSpan }),
      sensitive: classification.sensitive,
      reason: classification.reason,
      rule: classification.rule,
    });
  }
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

/**
 * Splits text into lines, keeping each terminator. A trailing terminator
 * does not open an extra empty line.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;

  while (start < text.length) {
    const nl = text.indexOf('\n', start);
    if (nl === -1) {
      lines.push({ raw: text.slice(start), terminator: '' });
      break;
    }

    const crlf = nl > start && text.charAt(nl - 1) === '\r';
    lines.push({
      raw: text.slice(start, crlf ? nl - 1 : nl),
      terminator: crlf ? '\r\n' : '\n',
    });
    start = nl + 1;
  }

  return lines;
}

function plainRecord(
  fields: Pick<LineRecord, 'lineNumber' | 'raw' | 'terminator' | 'kind' | 'section'> &
    Partial<Pick<LineRecord, 'isComment'>>
): LineRecord {
  return Object.freeze({
    isComment: false,
    ...fields,
    key: null,
    value: null,
    valueSpan: null,
    sensitive: false,
    reason: NOT_SENSITIVE.reason,
    rule: null,
  });
}

function toFinding(record: LineRecord): Finding {
  return Object.freeze({
    lineNumber: record.lineNumber,
    section: record.section,
    key: record.key ?? '',
    reason: record.reason,
    rule: record.rule,
  });
}

export default LineScanner;
