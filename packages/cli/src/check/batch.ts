/**
 * Batch Checking
 * Check several files, each independently of the others.
 */

import { readFile } from 'node:fs/promises';
import type { Rule, Severity } from './types.js';
import { checkSource, type FileCheckResult } from './validator.js';

/** Outcome of checking one file */
export type FileReport =
  | ({ readonly path: string; readonly source: string } & Extract<
      FileCheckResult,
      { status: 'analyzed' }
    >)
  | {
      readonly path: string;
      readonly status: 'unreadable';
      readonly reason: string;
      /** Error code from the file system (e.g. ENOENT), when there is one */
      readonly code: string | null;
      readonly diagnostics: [];
    }
  | ({ readonly path: string; readonly source: string } & Extract<
      FileCheckResult,
      { status: 'unanalyzable' }
    >);

function errorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

async function checkFile(
  path: string,
  rules: readonly Rule[],
  severities: Readonly<Record<string, Severity>>
): Promise<FileReport> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (err) {
    return {
      path,
      status: 'unreadable',
      reason: err instanceof Error ? err.message : String(err),
      code: errorCode(err),
      diagnostics: [],
    };
  }
  return { path, source, ...checkSource(source, rules, severities) };
}

/** Files read at the same time by default */
export const DEFAULT_READ_CONCURRENCY = 64;

/**
 * Check files concurrently, at most `concurrency` at a time.
 * Reports keep the order of `paths`; a file that cannot be read or parsed
 * does not affect the others.
 */
export async function checkFiles(
  paths: readonly string[],
  rules: readonly Rule[],
  severities: Readonly<Record<string, Severity>> = {},
  concurrency: number = DEFAULT_READ_CONCURRENCY
): Promise<FileReport[]> {
  const limit = concurrency >= 1 ? Math.floor(concurrency) : 1;
  const reports: FileReport[] = [];
  for (let i = 0; i < paths.length; i += limit) {
    const batch = paths.slice(i, i + limit);
    const batchReports = await Promise.all(
      batch.map((path) => checkFile(path, rules, severities))
    );
    reports.push(...batchReports);
  }
  return reports;
}
