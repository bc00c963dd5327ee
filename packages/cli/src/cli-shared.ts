/**
 * CLI Shared Utilities
 * Common functions for the command-line tools
 */

import { readFileSync } from 'node:fs';
import { JstyleError } from '@jstyle/core';

/**
 * Read the package version from the package.json next to src/ and dist/.
 *
 * @returns Version string, or "unknown" when it cannot be determined
 */
export function readVersion(): string {
  try {
    const data: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof data === 'object' &&
      data !== null &&
      'version' in data &&
      typeof data.version === 'string'
    ) {
      return data.version;
    }
  } catch {
    return 'unknown';
  }
  return 'unknown';
}

/**
 * Format error for stderr output
 *
 * Registry errors carry their ID; file system errors name the path.
 */
export function formatError(err: unknown): string {
  if (err instanceof JstyleError) {
    return `${err.errorId}: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}
