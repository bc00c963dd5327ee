/**
 * jstyle Core
 * Exports the source index, the Java CST and the error taxonomy
 */

export {
  LineIndex,
  rangesOverlap,
  type SourceLocation,
  type SourceSpan,
  type TextRange,
} from './source-location.js';
export {
  ancestors,
  closestAncestor,
  firstNamedChild,
  hasToken,
  isAncestorOf,
  unwrapParentheses,
  walkPreOrder,
  type CstNode,
  type JavaParseResult,
  type ParseOutcome,
} from './cst/types.js';
export { parseJava, tryParseJava } from './cst/java-parser.js';
export {
  CATEGORY_PREFIX,
  ERROR_REGISTRY,
  isWellFormedErrorId,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ConfigError,
  createError,
  JstyleError,
  ParseError,
  type JstyleErrorData,
} from './error-classes.js';
