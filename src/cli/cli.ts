#!/usr/bin/env node
/**
 * toml-redact - redact sensitive values from TOML configuration files
 *
 * Usage:
 *   toml-redact deployment.toml
 *   toml-redact deployment.toml -o deployment.redacted.toml
 *   toml-redact --check conf/*.toml
 *
 * Run with --help for all options.
 */

import { ExitCode, logger, runCli } from './run.js';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  logger.error({ err }, 'Unexpected failure');
  console.error('Unexpected error:', err instanceof Error ? err.message : err);
  process.exitCode = ExitCode.INTERNAL;
}
