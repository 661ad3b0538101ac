/**
 * Unit tests for configuration handling
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, createConfig, validateConfig } from '../shared/config.js';
import { RedactorError, RedactorErrorCode, isRedactorError } from '../shared/errors.js';

describe('Configuration', () => {
  it('should apply defaults', () => {
    expect(createConfig()).toEqual({
      redactionMarker: '***REDACTED***',
      checkValues: true,
      includeComments: false,
      removeComments: false,
    });
  });

  it('should override only the given options', () => {
    const config = createConfig({ checkValues: false, redactionMarker: '<hidden>' });

    expect(config.checkValues).toBe(false);
    expect(config.redactionMarker).toBe('<hidden>');
    expect(config.includeComments).toBe(false);
  });

  it('should fall back to defaults for undefined options', () => {
    expect(createConfig({ redactionMarker: undefined }).redactionMarker).toBe('***REDACTED***');
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(createConfig())).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });

  it('should reject an empty marker', () => {
    let caught: unknown;
    try {
      createConfig({ redactionMarker: '' });
    } catch (error) {
      caught = error;
    }

    expect(isRedactorError(caught)).toBe(true);
    expect(caught).toMatchObject({
      code: RedactorErrorCode.INVALID_CONFIGURATION,
      details: { field: 'redactionMarker' },
    });
  });

  it('should reject a marker containing a line break', () => {
    expect(() => validateConfig({ ...DEFAULT_CONFIG, redactionMarker: 'a\nb' }))
      .toThrow('Redaction marker must not contain line breaks');
  });

  it('should reject markers that would break the line structure', () => {
    for (const marker of ['a"b', "it's", 'back\\slash', '#gone']) {
      let caught: unknown;
      try {
        createConfig({ redactionMarker: marker });
      } catch (error) {
        caught = error;
      }

      expect(caught).toMatchObject({
        code: RedactorErrorCode.INVALID_CONFIGURATION,
        message: 'Redaction marker must not contain quotes, backslashes or "#"',
        details: { field: 'redactionMarker' },
      });
    }
  });

  it('should accept bracketed and symbolic markers', () => {
    for (const marker of ['[X]', '<removed>', '***REDACTED***']) {
      expect(createConfig({ redactionMarker: marker }).redactionMarker).toBe(marker);
    }
  });

  it('should name the error class', () => {
    const error = new RedactorError(RedactorErrorCode.USAGE_ERROR, 'bad');

    expect(error.name).toBe('RedactorError');
    expect(error).toBeInstanceOf(Error);
    expect(error.details).toBeUndefined();
  });
});
