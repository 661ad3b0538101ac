/**
 * CLI runner - argument parsing, file dispatch and exit status.
 *
 * Kept separate from the executable so it can be driven from tests with
 * captured output.
 */

import { createLogger } from '../shared/logger.js';
import { createConfig, type RedactorConfig } from '../shared/config.js';
import { RedactorError, RedactorErrorCode, isRedactorError } from '../shared/errors.js';
import { FileRedactor } from '../files/file-redactor.js';
import { formatReport, toJsonReport, type JsonReport } from '../redactor/report.js';

export const logger = createLogger('redactor:cli');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export const ExitCode = {
  OK: 0,
  FINDINGS: 1,
  USAGE: 2,
  FILE_ERROR: 3,
  INTERNAL: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliOptions {
  files: string[];
  output?: string;
  inPlace: boolean;
  backup: boolean;
  redactionText?: string;
  checkValues: boolean;
  includeComments: boolean;
  removeComments: boolean;
  report: boolean;
  check: boolean;
  json: boolean;
  help: boolean;
}

/** Output sinks and environment, injectable for tests. */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  env: process.env,
};

export const USAGE = `Usage: toml-redact [options] <file...>

Redact passwords, keys and tokens from TOML configuration files.

Options:
  -o, --output <path>          Write redacted output to a file (single input only)
  -i, --in-place               Overwrite the input file(s)
      --backup                 With --in-place, keep a copy at <file>.bak
  -r, --redaction-text <text>  Replacement text (default: ***REDACTED***)
      --no-check-values        Only redact based on key names, not value patterns
      --include-comments       Also redact commented-out key/value lines
      --remove-comments        Remove all comment lines from the output
      --report                 Print a redaction report to stderr
      --check                  Report findings only; exit 1 if any are found
      --json                   Print the report as JSON
  -h, --help                   Show this help message

Environment variables:
  TOML_REDACT_MARKER  Replacement text when -r is not given
  LOG_LEVEL           Logging level (debug, info, warn, error, silent)

Examples:
  toml-redact deployment.toml
  toml-redact deployment.toml -o deployment.redacted.toml
  toml-redact --in-place --backup conf/*.toml
  toml-redact --check conf/deployment.toml
`;

// ═══════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════

/**
 * Parses command-line arguments.
 * @throws RedactorError with code USAGE_ERROR
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    files: [],
    inPlace: false,
    backup: false,
    checkValues: true,
    includeComments: false,
    removeComments: false,
    report: false,
    check: false,
    json: false,
    help: false,
  };

  const takeValue = (index: number, flag: string): string => {
    const value = args[index + 1];
    if (value === undefined) {
      throw new RedactorError(RedactorErrorCode.USAGE_ERROR, `Option ${flag} requires a value`, { flag });
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-o':
      case '--output':
        options.output = takeValue(i++, arg);
        break;
      case '-r':
      case '--redaction-text':
        options.redactionText = takeValue(i++, arg);
        break;
      case '-i':
      case '--in-place':
        options.inPlace = true;
        break;
      case '--backup':
        options.backup = true;
        break;
      case '--no-check-values':
        options.checkValues = false;
        break;
      case '--include-comments':
        options.includeComments = true;
        break;
      case '--remove-comments':
        options.removeComments = true;
        break;
      case '--report':
        options.report = true;
        break;
      case '--check':
        options.check = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--':
        options.files.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new RedactorError(RedactorErrorCode.USAGE_ERROR, `Unknown option: ${arg}`, { arg });
        }
        options.files.push(arg);
    }
  }

  if (options.help) return options;

  if (options.files.length === 0) {
    throw new RedactorError(RedactorErrorCode.USAGE_ERROR, 'No input file given');
  }
  if (options.output !== undefined && options.files.length > 1) {
    throw new RedactorError(RedactorErrorCode.USAGE_ERROR, '--output accepts a single input file');
  }
  if (options.output !== undefined && options.inPlace) {
    throw new RedactorError(RedactorErrorCode.USAGE_ERROR, '--output and --in-place are mutually exclusive');
  }
  if (options.backup && !options.inPlace) {
    throw new RedactorError(RedactorErrorCode.USAGE_ERROR, '--backup requires --in-place');
  }

  return options;
}

// ═══════════════════════════════════════════════════════════════
// RUNNER
// ═══════════════════════════════════════════════════════════════

/** Runs the CLI and returns the process exit status. */
export function runCli(args: readonly string[], io: CliIO = defaultIO): ExitCode {
  const prepared = prepare(args, io);
  if (typeof prepared === 'number') return prepared;
  const { options, config } = prepared;

  logger.debug({ options }, 'Parsed arguments');

  const fileRedactor = new FileRedactor();
  const reports: JsonReport[] = [];
  let totalFindings = 0;
  let fileErrors = 0;

  // The report goes to stdout when it is the only output
  const reportSink = options.check ? io.stdout : io.stderr;

  for (const file of options.files) {
    try {
      const result = fileRedactor.redactFile(file, {
        config,
        ...(options.check ? {} : { outputPath: options.output, inPlace: options.inPlace }),
        backup: options.backup,
      });
      totalFindings += result.findings.length;

      if (!options.check && result.writtenTo === null) {
        io.stdout(result.redactedText);
      }
      if (result.backupPath !== null) {
        io.stderr(`Backup written to: ${result.backupPath}\n`);
      }
      if (result.writtenTo !== null) {
        io.stderr(`Redacted ${result.redactedCount} sensitive fields\nOutput written to: ${result.writtenTo}\n`);
      }

      if (options.json) {
        reports.push(toJsonReport(result.findings, { file }));
      } else if (options.check || options.report) {
        reportSink(`${formatReport(result.findings, { file })}\n`);
      }
    } catch (error) {
      if (!isRedactorError(error)) throw error;
      logger.warn({ file, code: error.code }, 'File could not be processed');
      io.stderr(`Error: ${error.message}\n`);
      fileErrors++;
    }
  }

  if (options.json) {
    reportSink(`${JSON.stringify(reports, null, 2)}\n`);
  }

  if (fileErrors > 0) return ExitCode.FILE_ERROR;
  if (options.check && totalFindings > 0) return ExitCode.FINDINGS;
  return ExitCode.OK;
}

/** Parses arguments and builds the configuration, or returns an exit status. */
function prepare(
  args: readonly string[],
  io: CliIO
): { options: CliOptions; config: RedactorConfig } | ExitCode {
  try {
    const options = parseCliArgs(args);
    if (options.help) {
      io.stdout(USAGE);
      return ExitCode.OK;
    }

    const config = createConfig({
      redactionMarker: options.redactionText ?? io.env['TOML_REDACT_MARKER'],
      checkValues: options.checkValues,
      includeComments: options.includeComments,
      removeComments: options.removeComments,
    });
    return { options, config };
  } catch (error) {
    if (!isRedactorError(error)) throw error;
    io.stderr(`Error: ${error.message}\n\n${USAGE}`);
    return ExitCode.USAGE;
  }
}
