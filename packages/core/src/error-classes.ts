/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface JstyleErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up error definition from registry, renders message template with
 * context, and creates the error class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("JSTYLE-R001", { rule: "Foo" })
 * // JstyleError: "Unknown rule module: Foo"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): JstyleError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'parse':
      return new ParseError(errorId, message, location, context);
    case 'config':
      return new ConfigError(errorId, message, context);
    default:
      return new JstyleError({ errorId, message, location, context });
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all jstyle errors.
 * Provides structured data for host applications to format as needed.
 */
export class JstyleError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: JstyleErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'JstyleError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): JstyleErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: JstyleErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** The parser could not produce a tree for a source file */
export class ParseError extends JstyleError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation | undefined,
    context?: Record<string, unknown> | undefined
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

/** Configuration file could not be read or has the wrong shape */
export class ConfigError extends JstyleError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown> | undefined
  ) {
    assertCategory(errorId, 'config');
    super({ errorId, message, context });
    this.name = 'ConfigError';
  }
}
