/**
 * Configuration Loader for jstyle-check
 * Loads and validates .jstyle.json / .jstyle.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { extname, join } from 'node:path';
import * as yaml from 'yaml';
import { createError } from '@jstyle/core';
import type {
  CheckConfig,
  ConfigWarning,
  Properties,
  Rule,
  RuleState,
  Severity,
} from './types.js';
import { EMPTY_PROPERTIES, toProperties } from './properties.js';
import { RULE_FACTORIES, findRuleFactory } from './rules/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in search order */
export const CONFIG_FILE_NAMES = [
  '.jstyle.json',
  '.jstyle.yaml',
  '.jstyle.yml',
] as const;

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled.
 * Every registered rule is 'on' at its default severity with no options.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const factory of RULE_FACTORIES) {
    rules[factory.moduleName] = 'on';
    severity[factory.moduleName] = factory.defaultSeverity;
  }

  return { rules, severity, properties: {} };
}

// ============================================================
// VALIDATION
// ============================================================

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function shapeError(reason: string): Error {
  return createError('JSTYLE-C003', { reason });
}

/** Read an optional object-valued section of the configuration */
function section(
  data: Record<string, unknown>,
  name: string
): Record<string, unknown> {
  const value = data[name];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw shapeError(`${name} must be an object`);
  }
  return value;
}

/**
 * Validate parsed configuration data and merge it over the defaults.
 *
 * @param data - Parsed JSON or YAML document
 * @param source - Path of the file the data came from, for messages
 * @throws ConfigError JSTYLE-C003 for a wrong shape
 * @throws ConfigError JSTYLE-C004 for an invalid rule state
 * @throws ConfigError JSTYLE-C005 for an invalid severity
 */
export function parseConfig(data: unknown, source: string): CheckConfig {
  // An empty YAML document parses to null
  if (data === null || data === undefined) {
    return createDefaultConfig();
  }
  if (!isRecord(data)) {
    throw shapeError(`${source} must contain an object`);
  }

  const defaults = createDefaultConfig();

  const rules: Record<string, RuleState> = { ...defaults.rules };
  for (const [rule, state] of Object.entries(section(data, 'rules'))) {
    if (!isRuleState(state)) {
      throw createError('JSTYLE-C004', { rule, state: String(state) });
    }
    rules[rule] = state;
  }

  const severity: Record<string, Severity> = { ...defaults.severity };
  for (const [rule, value] of Object.entries(section(data, 'severity'))) {
    if (!isSeverity(value)) {
      throw createError('JSTYLE-C005', { rule, severity: String(value) });
    }
    severity[rule] = value;
  }

  const properties: Record<string, Properties> = {};
  for (const [rule, values] of Object.entries(section(data, 'properties'))) {
    if (!isRecord(values)) {
      throw shapeError(`properties.${rule} must be an object`);
    }
    const flat: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(values)) {
      if (
        typeof value !== 'string' &&
        typeof value !== 'number' &&
        typeof value !== 'boolean'
      ) {
        throw shapeError(
          `properties.${rule}.${key} must be a string, number or boolean`
        );
      }
      flat[key] = value;
    }
    properties[rule] = toProperties(flat);
  }

  return { rules, severity, properties };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from the first configuration file found in `cwd`.
 *
 * @param cwd - Directory to search for a configuration file
 * @returns CheckConfig object, or null if no file is found
 * @throws ConfigError JSTYLE-C001 if the file cannot be read
 * @throws ConfigError JSTYLE-C002 if the file is not valid JSON or YAML
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const configPath = CONFIG_FILE_NAMES.map((name) => join(cwd, name)).find(
    (path) => existsSync(path)
  );

  // Return null if file not found (not an error)
  if (configPath === undefined) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw createError('JSTYLE-C001', {
      path: configPath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const isJson = extname(configPath) === '.json';
  let parsedData: unknown;
  try {
    parsedData = isJson ? JSON.parse(fileContent) : yaml.parse(fileContent);
  } catch (err) {
    throw createError('JSTYLE-C002', {
      format: isJson ? 'JSON' : 'YAML',
      path: configPath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  return parseConfig(parsedData, configPath);
}

// ============================================================
// RULE INSTANTIATION
// ============================================================

export interface ConfiguredRules {
  /** Enabled rules in registration order */
  readonly rules: Rule[];
  /** Effective severity per enabled rule */
  readonly severities: Record<string, Severity>;
  readonly warnings: ConfigWarning[];
}

/**
 * Instantiate every enabled rule in registration order.
 *
 * A rule in state 'warn' reports at severity 'warning' whatever its
 * configured severity. Names in the configuration that match no rule
 * produce a warning and are otherwise ignored.
 */
export function createRules(config: CheckConfig): ConfiguredRules {
  const warnings: ConfigWarning[] = [];
  const warn = (warning: ConfigWarning): void => {
    warnings.push(warning);
  };

  const sections: Array<[string, Readonly<Record<string, unknown>>]> = [
    ['rules', config.rules],
    ['severity', config.severity],
    ['properties', config.properties],
  ];
  for (const [name, entries] of sections) {
    for (const rule of Object.keys(entries)) {
      if (!findRuleFactory(rule)) {
        warn({
          rule,
          key: name,
          value: rule,
          message: `Unknown rule module ${rule} in ${name}, ignored`,
        });
      }
    }
  }

  const rules: Rule[] = [];
  const severities: Record<string, Severity> = {};
  for (const factory of RULE_FACTORIES) {
    const state = config.rules[factory.moduleName] ?? 'on';
    if (state === 'off') {
      continue;
    }
    rules.push(
      factory.fromConfig(
        config.properties[factory.moduleName] ?? EMPTY_PROPERTIES,
        warn
      )
    );
    severities[factory.moduleName] =
      state === 'warn'
        ? 'warning'
        : (config.severity[factory.moduleName] ?? factory.defaultSeverity);
  }

  return { rules, severities, warnings };
}
