/**
 * Files Module - Public API
 */

export { FileRedactor, BACKUP_SUFFIX, default } from './file-redactor.js';
export type { FileRedactionOptions, FileRedactionResult } from './file-redactor.js';
