#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for jstyle-check.
 * Checks Java source files against the configured rules.
 */

import { writeFile } from 'node:fs/promises';
import type {
  ApplyResult,
  FileReport,
  ReportedDiagnostic,
  Rule,
  Severity,
} from './check/index.js';
import {
  RULE_FACTORIES,
  applyFixes,
  checkFiles,
  checkSource,
  createDefaultConfig,
  createRules,
  loadConfig,
  toDiagnosticRecord,
} from './check/index.js';
import { detectHelpVersionFlag, formatError, readVersion } from './cli-shared.js';

/**
 * Parsed command-line arguments for jstyle-check
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      files: string[];
      fix: boolean;
      verbose: boolean;
      format: 'text' | 'json';
    }
  | { mode: 'help' }
  | { mode: 'version' };

/** Exit codes */
export const EXIT_CLEAN = 0;
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_UNREADABLE = 2;
export const EXIT_UNANALYZABLE = 3;

const HELP_TEXT = `jstyle-check - Check Java sources

Usage: jstyle-check [options] <file>...

Options:
  --fix           Apply automatic fixes and report what remains
  --format <fmt>  Output format: text (default) or json
  --verbose       Include rule categories in JSON output
  -h, --help      Show this help message
  -v, --version   Show version number

Configuration is read from .jstyle.json, .jstyle.yaml or .jstyle.yml
in the working directory.`;

/**
 * Parse command-line arguments for jstyle-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) {
    return helpOrVersion;
  }

  const fix = argv.includes('--fix');
  const verbose = argv.includes('--verbose');

  let format: 'text' | 'json' = 'text';
  const formatIndex = argv.indexOf('--format');
  if (formatIndex !== -1) {
    const formatValue = argv[formatIndex + 1];
    if (formatValue === 'text' || formatValue === 'json') {
      format = formatValue;
    } else if (!formatValue || formatValue.startsWith('-')) {
      throw new Error('--format requires argument: text or json');
    } else {
      throw new Error(`Invalid format: ${formatValue}. Expected text or json`);
    }
  }

  const knownFlags = new Set(['--fix', '--verbose', '--format']);
  const files: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg === '--format') {
      i++; // Skip the format value
      continue;
    }
    if (arg.startsWith('-')) {
      if (!knownFlags.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      continue;
    }
    files.push(arg);
  }

  if (files.length === 0) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', files, fix, verbose, format };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostics for output
 *
 * Text format: file:line:col: severity: message (rule)
 * JSON format: file, errors array and summary
 * Verbose mode: adds the rule category to JSON records
 */
export function formatDiagnostics(
  file: string,
  diagnostics: readonly ReportedDiagnostic[],
  format: 'text' | 'json',
  verbose: boolean
): string {
  if (format === 'json') {
    return JSON.stringify(diagnosticsDocument(file, diagnostics, verbose), null, 2);
  }
  return formatDiagnosticsText(file, diagnostics);
}

/**
 * Format diagnostics as text
 * Pattern: file:line:col: severity: message (rule)
 */
function formatDiagnosticsText(
  file: string,
  diagnostics: readonly ReportedDiagnostic[]
): string {
  return diagnostics
    .map((d) => {
      const { line, column } = d.span.start;
      return `${file}:${line}:${column}: ${d.severity}: ${d.message} (${d.rule})`;
    })
    .join('\n');
}

/** JSON document for one file */
export function diagnosticsDocument(
  file: string,
  diagnostics: readonly ReportedDiagnostic[],
  verbose: boolean
): Record<string, unknown> {
  const categoryMap = new Map<string, string>();
  for (const factory of RULE_FACTORIES) {
    categoryMap.set(factory.moduleName, factory.category);
  }

  const errors = diagnostics.map((d) => {
    const record: Record<string, unknown> = { ...toDiagnosticRecord(d) };
    if (verbose) {
      const category = categoryMap.get(d.rule);
      if (category) {
        record['category'] = category;
      }
    }
    return record;
  });

  const summary = {
    total: diagnostics.length,
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };

  return { file, errors, summary };
}

// ============================================================
// EXIT STATUS
// ============================================================

/**
 * Exit code for a batch of file reports.
 * An unreadable file outranks an unanalyzable one, which outranks
 * diagnostics and failed fixes.
 */
export function determineExitCode(
  reports: readonly FileReport[],
  fixFailures = 0
): number {
  if (reports.some((r) => r.status === 'unreadable')) {
    return EXIT_UNREADABLE;
  }
  if (reports.some((r) => r.status === 'unanalyzable')) {
    return EXIT_UNANALYZABLE;
  }
  if (fixFailures > 0 || reports.some((r) => r.diagnostics.length > 0)) {
    return EXIT_DIAGNOSTICS;
  }
  return EXIT_CLEAN;
}

/** stderr line for a file that could not be checked, or null */
export function describeFailure(report: FileReport): string | null {
  if (report.status === 'unreadable') {
    switch (report.code) {
      case 'ENOENT':
        return `Error: File not found: ${report.path}`;
      case 'EISDIR':
        return `Error: Path is a directory: ${report.path}`;
      default:
        return `Error: Cannot read file: ${report.path}`;
    }
  }
  if (report.status === 'unanalyzable') {
    return `Error: Cannot analyze ${report.path}: ${report.reason}`;
  }
  return null;
}

// ============================================================
// FIXING
// ============================================================

type AnalyzedReport = Extract<FileReport, { status: 'analyzed' }>;

/** Outcome of fixing one file */
export type FixOutcome =
  | {
      readonly status: 'fixed';
      readonly applied: number;
      readonly skipped: number;
      /** The file as written, checked again */
      readonly report: FileReport;
    }
  | { readonly status: 'failed'; readonly message: string };

/**
 * Apply fixes to one analyzed file, write it back and check the result.
 * A fix that breaks the source or a failed write leaves the file as it was
 * and is returned as a failure.
 */
export async function fixFile(
  report: AnalyzedReport,
  rules: readonly Rule[],
  severities: Readonly<Record<string, Severity>> = {}
): Promise<FixOutcome> {
  let result: ApplyResult;
  try {
    result = applyFixes(report.source, report.diagnostics);
    if (result.applied > 0) {
      await writeFile(report.path, result.modified, 'utf-8');
    }
  } catch (err) {
    return { status: 'failed', message: formatError(err) };
  }

  const remaining: FileReport =
    result.applied > 0
      ? {
          path: report.path,
          source: result.modified,
          ...checkSource(result.modified, rules, severities),
        }
      : report;
  return {
    status: 'fixed',
    applied: result.applied,
    skipped: result.skipped,
    report: remaining,
  };
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function plural(count: number): string {
  return `${count} fix${count === 1 ? '' : 'es'}`;
}

/**
 * Main entry point for jstyle-check CLI.
 * Orchestrates argument parsing, configuration, checking, fixing, and output.
 */
async function main(): Promise<void> {
  try {
    const args = parseCheckArgs(process.argv.slice(2));

    if (args.mode === 'help') {
      console.log(HELP_TEXT);
      process.exit(EXIT_CLEAN);
    }

    if (args.mode === 'version') {
      console.log(readVersion());
      process.exit(EXIT_CLEAN);
    }

    const config = loadConfig(process.cwd()) ?? createDefaultConfig();
    const { rules, severities, warnings } = createRules(config);
    for (const warning of warnings) {
      console.error(`Warning: ${warning.message}`);
    }

    const checked = await checkFiles(args.files, rules, severities);

    const reports: FileReport[] = [];
    let fixFailures = 0;
    const documents: Array<Record<string, unknown>> = [];
    const lines: string[] = [];
    for (const checkedReport of checked) {
      let report = checkedReport;

      if (args.fix && report.status === 'analyzed' && report.diagnostics.length > 0) {
        const outcome = await fixFile(report, rules, severities);
        if (outcome.status === 'failed') {
          fixFailures++;
          console.error(`Error: ${report.path}: ${outcome.message}`);
        } else {
          if (outcome.applied > 0) {
            console.error(`${report.path}: Applied ${plural(outcome.applied)}`);
          }
          if (outcome.skipped > 0) {
            console.error(`${report.path}: Skipped ${plural(outcome.skipped)}`);
          }
          report = outcome.report;
        }
      }
      reports.push(report);

      const failure = describeFailure(report);
      if (failure) {
        console.error(failure);
        if (args.fix && report.status === 'unanalyzable') {
          console.error('Cannot apply fixes: file could not be parsed');
        }
        continue;
      }
      if (report.status !== 'analyzed') {
        continue;
      }

      for (const ruleFailure of report.ruleFailures) {
        console.error(
          `Warning: ${report.path}: rule ${ruleFailure.rule} failed on ${ruleFailure.nodeKind} at offset ${ruleFailure.offset}: ${ruleFailure.message}`
        );
      }

      if (args.format === 'json') {
        documents.push(
          diagnosticsDocument(report.path, report.diagnostics, args.verbose)
        );
      } else if (report.diagnostics.length > 0) {
        lines.push(formatDiagnostics(report.path, report.diagnostics, 'text', false));
      }
    }

    if (args.format === 'json') {
      const output = documents.length === 1 ? documents[0] : documents;
      console.log(JSON.stringify(output, null, 2));
    } else if (lines.length > 0) {
      console.log(lines.join('\n'));
    } else if (fixFailures === 0 && reports.every((r) => r.status === 'analyzed')) {
      console.log('No issues found');
    }

    process.exit(determineExitCode(reports, fixFailures));
  } catch (err) {
    console.error(`Error: ${formatError(err)}`);
    process.exit(EXIT_DIAGNOSTICS);
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
