/**
 * Redactor - rebuilds a document from scan records.
 *
 * Only the value span of a sensitive record changes; quotes, key text,
 * indentation, inline comments and line terminators are copied as-is.
 * Comment lines are dropped entirely when `removeComments` is set.
 */

import { DEFAULT_CONFIG, validateConfig, type RedactorConfig } from '../shared/config.js';
import type { LineRecord, RenderResult, ScanResult } from '../shared/types.js';

export class Redactor {
  /**
   * Renders redacted text and findings.
   * @throws RedactorError when the configuration is invalid
   */
  render(scanResult: ScanResult, config: RedactorConfig = DEFAULT_CONFIG): RenderResult {
    validateConfig(config);

    const parts: string[] = [];
    let redactedCount = 0;

    for (const record of scanResult.records) {
      if (config.removeComments && record.isComment) continue;

      if (record.sensitive && record.valueSpan !== null) {
        parts.push(redactLine(record, config.redactionMarker), record.terminator);
        redactedCount++;
      } else {
        parts.push(record.raw, record.terminator);
      }
    }

    const findings = [...scanResult.findings].sort((a, b) => a.lineNumber - b.lineNumber);

    return {
      redactedText: parts.join(''),
      findings: Object.freeze(findings),
      redactedCount,
    };
  }
}

/** Replaces the value span of a record's line with the marker. */
export function redactLine(record: LineRecord, marker: string): string {
  if (record.valueSpan === null) return record.raw;

  const { start, end } = record.valueSpan;
  return record.raw.slice(0, start) + marker + record.raw.slice(end);
}

export default Redactor;
