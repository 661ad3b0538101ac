/**
 * Report formatting for findings.
 */

import type { Finding } from '../shared/types.js';

export interface ReportOptions {
  /** Source file name shown in the report. */
  file?: string;
}

/** Machine-readable report shape. */
export interface JsonReport {
  file: string | null;
  count: number;
  findings: Finding[];
}

export const NO_FINDINGS_MESSAGE = 'No sensitive data found.';

/**
 * Formats findings as text:
 *
 *   Redacted 2 sensitive fields in app.toml
 *   Lines modified: 3, 4
 *     app.toml:3 [database] password (name: password)
 *     app.toml:4 [database] api_key (name: api_key)
 */
export function formatReport(findings: readonly Finding[], options: ReportOptions = {}): string {
  const where = options.file !== undefined ? ` in ${options.file}` : '';

  if (findings.length === 0) {
    return options.file !== undefined ? `${options.file}: ${NO_FINDINGS_MESSAGE}` : NO_FINDINGS_MESSAGE;
  }

  const noun = findings.length === 1 ? 'field' : 'fields';
  const lines = [
    `Redacted ${findings.length} sensitive ${noun}${where}`,
    `Lines modified: ${findings.map(f => f.lineNumber).join(', ')}`,
  ];

  for (const finding of findings) {
    const location = options.file !== undefined
      ? `${options.file}:${finding.lineNumber}`
      : `line ${finding.lineNumber}`;
    const section = finding.section !== null ? ` [${finding.section}]` : '';
    const rule = finding.rule !== null ? `${finding.reason}: ${finding.rule}` : finding.reason;
    lines.push(`  ${location}${section} ${finding.key} (${rule})`);
  }

  return lines.join('\n');
}

export function toJsonReport(findings: readonly Finding[], options: ReportOptions = {}): JsonReport {
  return {
    file: options.file ?? null,
    count: findings.length,
    findings: findings.map(f => ({ ...f })),
  };
}

export function formatJsonReport(findings: readonly Finding[], options: ReportOptions = {}): string {
  return JSON.stringify(toJsonReport(findings, options), null, 2);
}
