/**
 * Coding Rules Tests
 * MultipleVariableDeclarations and OneStatementPerLine.
 */

import { describe, it, expect } from 'vitest';
import {
  MULTIPLE_VARIABLE_DECLARATIONS,
  ONE_STATEMENT_PER_LINE,
  applyFixes,
} from '../../../src/check/index.js';
import { inMethod, messagesOf, runRule } from '../../helpers.js';

const COMMA_MESSAGE = 'Each variable declaration must be in its own statement.';
const SAME_LINE_MESSAGE = 'Only one variable definition per line allowed.';
const ONE_STATEMENT_MESSAGE = 'Only one statement per line allowed.';

// ============================================================
// MULTIPLE VARIABLE DECLARATIONS
// ============================================================

describe('MultipleVariableDeclarations', () => {
  it('reports a local declaration with several declarators', () => {
    const source = inMethod('    int a = 1, b;');
    const diagnostics = runRule(MULTIPLE_VARIABLE_DECLARATIONS, source);

    expect(messagesOf(diagnostics)).toEqual([COMMA_MESSAGE]);
    expect(diagnostics[0]?.kind.id).toBe('multiple.variable.declarations.comma');
    expect(diagnostics[0]?.span.start.line).toBe(3);
    expect(diagnostics[0]?.span.start.column).toBe(5);
  });

  it('splits declarators into separate declarations', () => {
    const source = inMethod('    int a = 1, b;');
    const diagnostics = runRule(MULTIPLE_VARIABLE_DECLARATIONS, source);
    const result = applyFixes(source, diagnostics);

    expect(result.applied).toBe(1);
    expect(result.modified).toBe(inMethod('    int a = 1;\n    int b;'));
  });

  it('repeats modifiers in every split declaration', () => {
    const source = inMethod('    final int a = 1, b = 2;');
    const result = applyFixes(
      source,
      runRule(MULTIPLE_VARIABLE_DECLARATIONS, source)
    );
    expect(result.modified).toBe(
      inMethod('    final int a = 1;\n    final int b = 2;')
    );
  });

  it('reports field declarations', () => {
    const source = 'class A {\n  int a, b;\n}\n';
    const diagnostics = runRule(MULTIPLE_VARIABLE_DECLARATIONS, source);

    expect(messagesOf(diagnostics)).toEqual([COMMA_MESSAGE]);
    expect(applyFixes(source, diagnostics).modified).toBe(
      'class A {\n  int a;\n  int b;\n}\n'
    );
  });

  it('reports interface constants', () => {
    const source = 'interface I {\n  int A = 1, B = 2;\n}\n';
    const diagnostics = runRule(MULTIPLE_VARIABLE_DECLARATIONS, source);

    expect(messagesOf(diagnostics)).toEqual([COMMA_MESSAGE]);
    expect(diagnostics[0]?.span.start.line).toBe(2);
    expect(applyFixes(source, diagnostics).modified).toBe(
      'interface I {\n  int A = 1;\n  int B = 2;\n}\n'
    );
  });

  it('reports two interface constants on one line', () => {
    const source = 'interface I {\n  int A = 1; int B = 2;\n}\n';
    expect(
      messagesOf(runRule(MULTIPLE_VARIABLE_DECLARATIONS, source))
    ).toEqual([SAME_LINE_MESSAGE]);
  });

  it('reports two declarations on one line', () => {
    const source = inMethod('    int a = 1; int b = 2;');
    const diagnostics = runRule(MULTIPLE_VARIABLE_DECLARATIONS, source);

    expect(messagesOf(diagnostics)).toEqual([SAME_LINE_MESSAGE]);
    expect(diagnostics[0]?.kind.id).toBe('multiple.variable.declarations');
    expect(applyFixes(source, diagnostics).modified).toBe(
      inMethod('    int a = 1;\n    int b = 2;')
    );
  });

  it('accepts declarations on separate lines', () => {
    const source = inMethod('    int a = 1;\n    int b = 2;');
    expect(runRule(MULTIPLE_VARIABLE_DECLARATIONS, source)).toEqual([]);
  });

  it('exempts for-loop headers', () => {
    const source = inMethod('    for (int i = 0, j = 0; i < j; i++) {\n    }');
    expect(runRule(MULTIPLE_VARIABLE_DECLARATIONS, source)).toEqual([]);
  });
});

// ============================================================
// ONE STATEMENT PER LINE
// ============================================================

describe('OneStatementPerLine', () => {
  it('reports the second statement on a line', () => {
    const source = inMethod('    a(); b();');
    const diagnostics = runRule(ONE_STATEMENT_PER_LINE, source);

    expect(messagesOf(diagnostics)).toEqual([ONE_STATEMENT_MESSAGE]);
    expect(diagnostics[0]?.kind.id).toBe('one.statement.line');
    expect(diagnostics[0]?.span.start.column).toBe(10);
    expect(diagnostics[0]?.context).toBe('a(); b();');
  });

  it('moves the statement to its own line', () => {
    const source = inMethod('    a(); b(); c();');
    const diagnostics = runRule(ONE_STATEMENT_PER_LINE, source);
    const result = applyFixes(source, diagnostics);

    expect(diagnostics).toHaveLength(2);
    expect(result.applied).toBe(2);
    expect(result.modified).toBe(inMethod('    a();\n    b();\n    c();'));
  });

  it('accepts statements on separate lines', () => {
    expect(runRule(ONE_STATEMENT_PER_LINE, inMethod('    a();\n    b();'))).toEqual(
      []
    );
  });

  it('lets a compound statement break the chain', () => {
    const source = inMethod('    a(); if (c) { b(); }');
    expect(runRule(ONE_STATEMENT_PER_LINE, source)).toEqual([]);
  });

  it('skips comments between statements', () => {
    const source = inMethod('    a(); /* x */ b();');
    const diagnostics = runRule(ONE_STATEMENT_PER_LINE, source);

    expect(messagesOf(diagnostics)).toEqual([ONE_STATEMENT_MESSAGE]);
    expect(applyFixes(source, diagnostics).modified).toBe(
      inMethod('    a(); /* x */\n    b();')
    );
  });

  it('reports fields declared on one line', () => {
    const source = 'class A {\n  int a; int b;\n}\n';
    expect(messagesOf(runRule(ONE_STATEMENT_PER_LINE, source))).toEqual([
      ONE_STATEMENT_MESSAGE,
    ]);
  });

  it('checks try resources only when enabled', () => {
    const source = inMethod(
      '    try (Reader r = open(); Reader s = open()) {\n    }'
    );

    expect(runRule(ONE_STATEMENT_PER_LINE, source)).toEqual([]);

    const diagnostics = runRule(ONE_STATEMENT_PER_LINE, source, {
      treatTryResourcesAsStatement: true,
    });
    expect(messagesOf(diagnostics)).toEqual([ONE_STATEMENT_MESSAGE]);
    expect(diagnostics[0]?.fix?.edits[0]?.replacement).toBe('\n    ');
  });
});
