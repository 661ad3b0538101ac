/**
 * Unit tests for the CLI runner
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExitCode, USAGE, parseCliArgs, runCli, type CliIO } from '../cli/run.js';
import { RedactorErrorCode } from '../shared/errors.js';

const SECRET_DOC = '[database]\nhost = "localhost"\npassword = "p4ss"\n';
const CLEAN_DOC = '[server]\nport = 8080\n';

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(env: Record<string, string | undefined> = {}): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: text => { out.push(text); },
    stderr: text => { err.push(text); },
    env,
  };
}

describe('CLI', () => {
  let dir: string;
  let secretFile: string;
  let cleanFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'toml-redactor-cli-'));
    secretFile = join(dir, 'secret.toml');
    cleanFile = join(dir, 'clean.toml');
    writeFileSync(secretFile, SECRET_DOC, 'utf-8');
    writeFileSync(cleanFile, CLEAN_DOC, 'utf-8');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('parseCliArgs', () => {
    it('should parse options and files', () => {
      const options = parseCliArgs(['-o', 'out.toml', '--no-check-values', '-r', '[X]', 'in.toml']);

      expect(options.output).toBe('out.toml');
      expect(options.redactionText).toBe('[X]');
      expect(options.checkValues).toBe(false);
      expect(options.files).toEqual(['in.toml']);
    });

    it('should treat everything after -- as files', () => {
      expect(parseCliArgs(['--', '--odd-name.toml']).files).toEqual(['--odd-name.toml']);
    });

    it('should reject invalid combinations', () => {
      expect(() => parseCliArgs([])).toThrow('No input file given');
      expect(() => parseCliArgs(['--bogus', 'a.toml'])).toThrow('Unknown option: --bogus');
      expect(() => parseCliArgs(['-o'])).toThrow('Option -o requires a value');
      expect(() => parseCliArgs(['-o', 'out.toml', 'a.toml', 'b.toml'])).toThrow('--output accepts a single input file');
      expect(() => parseCliArgs(['--backup', 'a.toml'])).toThrow('--backup requires --in-place');
    });

    it('should raise usage errors with the USAGE_ERROR code', () => {
      let caught: unknown;
      try {
        parseCliArgs([]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({ code: RedactorErrorCode.USAGE_ERROR });
    });
  });

  describe('runCli', () => {
    it('should print help', () => {
      const io = captureIO();

      expect(runCli(['--help'], io)).toBe(ExitCode.OK);
      expect(io.out.join('')).toBe(USAGE);
    });

    it('should exit with USAGE for bad arguments', () => {
      const io = captureIO();

      expect(runCli([], io)).toBe(ExitCode.USAGE);
      expect(io.err.join('')).toBe(`Error: No input file given\n\n${USAGE}`);
    });

    it('should exit with USAGE for an empty marker', () => {
      const io = captureIO();

      expect(runCli(['-r', '', secretFile], io)).toBe(ExitCode.USAGE);
      expect(io.err.join('')).toContain('Error: Redaction marker must not be empty');
    });

    it('should exit with USAGE for a marker containing a quote', () => {
      const io = captureIO({ TOML_REDACT_MARKER: 'a"b' });

      expect(runCli([secretFile], io)).toBe(ExitCode.USAGE);
      expect(io.out).toEqual([]);
    });

    it('should print the redacted document to stdout', () => {
      const io = captureIO();

      expect(runCli([secretFile], io)).toBe(ExitCode.OK);
      expect(io.out.join('')).toBe('[database]\nhost = "localhost"\npassword = "***REDACTED***"\n');
    });

    it('should take the marker from the environment', () => {
      const io = captureIO({ TOML_REDACT_MARKER: '<gone>' });

      runCli([secretFile], io);

      expect(io.out.join('')).toBe('[database]\nhost = "localhost"\npassword = "<gone>"\n');
    });

    it('should prefer the command-line marker over the environment', () => {
      const io = captureIO({ TOML_REDACT_MARKER: '<gone>' });

      runCli(['-r', '[X]', secretFile], io);

      expect(io.out.join('')).toBe('[database]\nhost = "localhost"\npassword = "[X]"\n');
    });

    it('should write the report to stderr with --report', () => {
      const io = captureIO();

      runCli(['--report', secretFile], io);

      expect(io.err.join('')).toBe(
        [
          `Redacted 1 sensitive field in ${secretFile}`,
          'Lines modified: 3',
          `  ${secretFile}:3 [database] password (name: password)`,
          '',
        ].join('\n')
      );
    });

    it('should exit with FINDINGS in check mode when secrets are present', () => {
      const io = captureIO();

      expect(runCli(['--check', secretFile], io)).toBe(ExitCode.FINDINGS);
      expect(io.out.join('')).toContain(`${secretFile}:3 [database] password (name: password)`);
      expect(readFileSync(secretFile, 'utf-8')).toBe(SECRET_DOC);
    });

    it('should exit with OK in check mode for a clean file', () => {
      const io = captureIO();

      expect(runCli(['--check', cleanFile], io)).toBe(ExitCode.OK);
      expect(io.out.join('')).toBe(`${cleanFile}: No sensitive data found.\n`);
    });

    it('should print a JSON report', () => {
      const io = captureIO();

      runCli(['--check', '--json', secretFile, cleanFile], io);

      const reports: unknown = JSON.parse(io.out.join(''));
      expect(reports).toEqual([
        {
          file: secretFile,
          count: 1,
          findings: [{ lineNumber: 3, section: 'database', key: 'password', reason: 'name', rule: 'password' }],
        },
        { file: cleanFile, count: 0, findings: [] },
      ]);
    });

    it('should redact in place with a backup', () => {
      const io = captureIO();

      expect(runCli(['--in-place', '--backup', secretFile], io)).toBe(ExitCode.OK);
      expect(readFileSync(secretFile, 'utf-8')).toBe('[database]\nhost = "localhost"\npassword = "***REDACTED***"\n');
      expect(readFileSync(`${secretFile}.bak`, 'utf-8')).toBe(SECRET_DOC);
      expect(io.out).toEqual([]);
    });

    it('should write to an output file', () => {
      const io = captureIO();
      const output = join(dir, 'out.toml');

      runCli(['-o', output, secretFile], io);

      expect(readFileSync(output, 'utf-8')).toBe('[database]\nhost = "localhost"\npassword = "***REDACTED***"\n');
      expect(io.err.join('')).toBe(`Redacted 1 sensitive fields\nOutput written to: ${output}\n`);
    });

    it('should exit with FILE_ERROR for a missing file and keep going', () => {
      const io = captureIO();
      const missing = join(dir, 'missing.toml');

      expect(runCli([missing, cleanFile], io)).toBe(ExitCode.FILE_ERROR);
      expect(io.err.join('')).toBe(`Error: Input file not found: ${missing}\n`);
      expect(io.out.join('')).toBe(CLEAN_DOC);
    });
  });
});
