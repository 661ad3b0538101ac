/**
 * Redactor Configuration
 *
 * Options are merged over defaults once per invocation and frozen.
 */

import { RedactorError, RedactorErrorCode } from './errors.js';

/** Options recognised by the scanner and redactor. */
export interface RedactorConfig {
  /** Text that replaces sensitive values. Default: '***REDACTED***' */
  readonly redactionMarker: string;
  /** Inspect values in addition to key names. Default: true */
  readonly checkValues: boolean;
  /** Parse and classify commented-out key/value lines. Default: false */
  readonly includeComments: boolean;
  /** Drop every comment line from the output. Default: false */
  readonly removeComments: boolean;
}

export type RedactorOptions = Partial<RedactorConfig>;

export const DEFAULT_REDACTION_MARKER = '***REDACTED***';

export const DEFAULT_CONFIG: RedactorConfig = Object.freeze({
  redactionMarker: DEFAULT_REDACTION_MARKER,
  checkValues: true,
  includeComments: false,
  removeComments: false,
});

/**
 * Builds a frozen configuration from partial options.
 * @throws RedactorError with code INVALID_CONFIGURATION
 */
export function createConfig(options: RedactorOptions = {}): RedactorConfig {
  const config: RedactorConfig = Object.freeze({
    redactionMarker: options.redactionMarker ?? DEFAULT_CONFIG.redactionMarker,
    checkValues: options.checkValues ?? DEFAULT_CONFIG.checkValues,
    includeComments: options.includeComments ?? DEFAULT_CONFIG.includeComments,
    removeComments: options.removeComments ?? DEFAULT_CONFIG.removeComments,
  });
  validateConfig(config);
  return config;
}

/**
 * Rejects configurations the redactor cannot honour.
 * @throws RedactorError with code INVALID_CONFIGURATION
 */
export function validateConfig(config: RedactorConfig): void {
  if (config.redactionMarker.length === 0) {
    throw new RedactorError(
      RedactorErrorCode.INVALID_CONFIGURATION,
      'Redaction marker must not be empty',
      { field: 'redactionMarker' }
    );
  }

  // A marker spanning lines would change the line count of the output
  if (/[\r\n]/.test(config.redactionMarker)) {
    throw new RedactorError(
      RedactorErrorCode.INVALID_CONFIGURATION,
      'Redaction marker must not contain line breaks',
      { field: 'redactionMarker' }
    );
  }

  // Quotes and backslashes would end the surrounding string early; `#`
  // would start a comment inside a bare value
  if (/["'\\#]/.test(config.redactionMarker)) {
    throw new RedactorError(
      RedactorErrorCode.INVALID_CONFIGURATION,
      'Redaction marker must not contain quotes, backslashes or "#"',
      { field: 'redactionMarker' }
    );
  }
}
