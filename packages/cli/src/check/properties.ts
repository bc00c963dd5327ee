/**
 * Rule Properties
 * Typed access to configured rule options with documented defaults.
 */

import type { Properties, WarningSink } from './types.js';

// ============================================================
// CONSTRUCTION
// ============================================================

/** Build Properties from a plain object, converting values to strings */
export function toProperties(
  values: Readonly<Record<string, string | number | boolean>> = {}
): Properties {
  return new Map(
    Object.entries(values).map(([key, value]) => [key, String(value)])
  );
}

export const EMPTY_PROPERTIES: Properties = new Map();

// ============================================================
// READER
// ============================================================

/**
 * Resolves recognised options of one rule.
 *
 * Absent keys yield the default silently. Malformed values yield the
 * default and a warning through the sink. Keys that are never read are
 * ignored.
 */
export class PropertyReader {
  constructor(
    private readonly rule: string,
    private readonly properties: Properties,
    private readonly warn?: WarningSink | undefined
  ) {}

  /** `true`/`false`, case-insensitive, surrounding whitespace ignored */
  boolean(key: string, defaultValue: boolean): boolean {
    const raw = this.properties.get(key);
    if (raw === undefined) {
      return defaultValue;
    }
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    this.report(key, raw, `expected true or false, using ${defaultValue}`);
    return defaultValue;
  }

  private report(key: string, value: string, detail: string): void {
    this.warn?.({
      rule: this.rule,
      key,
      value,
      message: `${this.rule}.${key} = "${value}": ${detail}`,
    });
  }
}
