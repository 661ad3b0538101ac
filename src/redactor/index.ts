/**
 * Redactor Module - Public API
 */

export { Redactor, redactLine, default } from './redactor.js';
export {
  formatReport,
  formatJsonReport,
  toJsonReport,
  NO_FINDINGS_MESSAGE,
} from './report.js';
export type { ReportOptions, JsonReport } from './report.js';
