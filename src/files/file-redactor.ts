/**
 * File Redactor - reads a document from disk, runs scan + render, and
 * writes the result.
 *
 * Output targets:
 * - `outputPath`: write the redacted text to another file
 * - `inPlace`: overwrite the input, optionally copying it to `<input>.bak` first
 * - neither: return the text without writing
 */

import { copyFileSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { createLogger } from '../shared/logger.js';
import { DEFAULT_CONFIG, type RedactorConfig } from '../shared/config.js';
import { RedactorError, RedactorErrorCode } from '../shared/errors.js';
import { LineScanner } from '../scanner/line-scanner.js';
import { Redactor } from '../redactor/redactor.js';
import type { Finding } from '../shared/types.js';

const logger = createLogger('redactor:files');

export const BACKUP_SUFFIX = '.bak';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface FileRedactionOptions {
  config?: RedactorConfig;
  /** Write the redacted text here. */
  outputPath?: string;
  /** Overwrite the input file. Ignored when `outputPath` is set. */
  inPlace?: boolean;
  /** Copy the input to `<input>.bak` before overwriting it. */
  backup?: boolean;
}

export interface FileRedactionResult {
  inputPath: string;
  redactedText: string;
  findings: readonly Finding[];
  redactedCount: number;
  /** Where the text was written, or null. */
  writtenTo: string | null;
  /** Backup copy created before an in-place write, or null. */
  backupPath: string | null;
}

// ═══════════════════════════════════════════════════════════════
// FILE REDACTOR
// ═══════════════════════════════════════════════════════════════

export class FileRedactor {
  private readonly scanner: LineScanner;
  private readonly redactor: Redactor;

  constructor(scanner: LineScanner = new LineScanner(), redactor: Redactor = new Redactor()) {
    this.scanner = scanner;
    this.redactor = redactor;
  }

  /**
   * Redacts one file.
   * @throws RedactorError (FILE_NOT_FOUND, READ_ERROR, WRITE_ERROR, INVALID_CONFIGURATION)
   */
  redactFile(inputPath: string, options: FileRedactionOptions = {}): FileRedactionResult {
    const config = options.config ?? DEFAULT_CONFIG;
    const text = this.readDocument(inputPath);

    const scanResult = this.scanner.scan(text, config);
    const { redactedText, findings, redactedCount } = this.redactor.render(scanResult, config);

    logger.debug({ inputPath, lines: scanResult.records.length, findings: findings.length }, 'Scanned document');

    let writtenTo: string | null = null;
    let backupPath: string | null = null;

    if (options.outputPath !== undefined) {
      this.writeDocument(options.outputPath, redactedText);
      writtenTo = options.outputPath;
    } else if (options.inPlace === true) {
      if (options.backup === true) {
        backupPath = this.createBackup(inputPath);
      }
      this.writeDocument(inputPath, redactedText);
      writtenTo = inputPath;
    }

    if (writtenTo !== null) {
      logger.info({ inputPath, writtenTo, redactedCount }, 'Redacted document written');
    }

    return { inputPath, redactedText, findings, redactedCount, writtenTo, backupPath };
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private readDocument(path: string): string {
    if (!existsSync(path)) {
      throw new RedactorError(RedactorErrorCode.FILE_NOT_FOUND, `Input file not found: ${path}`, { path });
    }

    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new RedactorError(
        RedactorErrorCode.READ_ERROR,
        `Failed to read ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { path },
        { cause: error }
      );
    }
  }

  private writeDocument(path: string, text: string): void {
    try {
      writeFileSync(path, text, 'utf-8');
    } catch (error) {
      throw new RedactorError(
        RedactorErrorCode.WRITE_ERROR,
        `Failed to write ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { path },
        { cause: error }
      );
    }
  }

  private createBackup(path: string): string {
    const backupPath = `${path}${BACKUP_SUFFIX}`;
    try {
      copyFileSync(path, backupPath);
    } catch (error) {
      throw new RedactorError(
        RedactorErrorCode.WRITE_ERROR,
        `Failed to create backup ${backupPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { path, backupPath },
        { cause: error }
      );
    }
    logger.info({ path, backupPath }, 'Backup created');
    return backupPath;
  }
}

export default FileRedactor;
