/**
 * FinalLocalVariable Rule Tests
 * Flow-sensitive detection of locals that receive exactly one value.
 */

import { describe, it, expect } from 'vitest';
import { FINAL_LOCAL_VARIABLE } from '../../../src/check/index.js';
import { inMethod, messagesOf, runRule } from '../../helpers.js';

function finalNames(
  source: string,
  properties: Record<string, string | number | boolean> = {}
): string[] {
  return messagesOf(runRule(FINAL_LOCAL_VARIABLE, source, properties)).map(
    (message) => {
      const match = /^Variable '(.+)' should be declared final\.$/.exec(message);
      if (!match?.[1]) {
        throw new Error(`unexpected message: ${message}`);
      }
      return match[1];
    }
  );
}

describe('FinalLocalVariable', () => {
  describe('straight-line code', () => {
    it('reports an initialized variable that is never reassigned', () => {
      const source = inMethod('    int x = 1;\n    use(x);');
      const diagnostics = runRule(FINAL_LOCAL_VARIABLE, source);

      expect(messagesOf(diagnostics)).toEqual([
        "Variable 'x' should be declared final.",
      ]);
      expect(diagnostics[0]?.span.start.line).toBe(3);
      expect(diagnostics[0]?.span.start.column).toBe(9);
      expect(diagnostics[0]?.span.end.column).toBe(10);
      expect(diagnostics[0]?.severity).toBe('warning');
      expect(diagnostics[0]?.fix).toBeNull();
    });

    it('ignores an initialized variable that is reassigned', () => {
      expect(finalNames(inMethod('    int x = 1;\n    x = 2;'))).toEqual([]);
    });

    it('treats compound assignment and increment as assignments', () => {
      expect(finalNames(inMethod('    int x = 0;\n    x += 1;'))).toEqual([]);
      expect(finalNames(inMethod('    int y = 0;\n    y++;'))).toEqual([]);
      expect(finalNames(inMethod('    int z = 0;\n    --z;'))).toEqual([]);
    });

    it('reports an uninitialized variable assigned exactly once', () => {
      expect(finalNames(inMethod('    int x;\n    x = 1;'))).toEqual(['x']);
    });

    it('ignores an uninitialized variable assigned twice', () => {
      expect(finalNames(inMethod('    int x;\n    x = 1;\n    x = 2;'))).toEqual(
        []
      );
    });

    it('ignores a declared variable that is never assigned', () => {
      expect(finalNames(inMethod('    int x;'))).toEqual([]);
    });

    it('ignores variables already declared final', () => {
      expect(finalNames(inMethod('    final int x = 1;'))).toEqual([]);
    });

    it('ignores assignments to parameters', () => {
      expect(finalNames(inMethod('    c = true;\n    k = 2;'))).toEqual([]);
    });

    it('checks every declarator of a declaration', () => {
      expect(finalNames(inMethod('    int a = 1, b = 2;\n    b = 3;'))).toEqual([
        'a',
      ]);
    });
  });

  describe('branches', () => {
    it('reports a variable assigned once in each branch of an if', () => {
      const body = '    int x;\n    if (c) {\n      x = 1;\n    } else {\n      x = 2;\n    }';
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });

    it('ignores a variable assigned after a branch that may have assigned it', () => {
      const body = '    int x;\n    if (c) {\n      x = 1;\n    }\n    x = 2;';
      expect(finalNames(inMethod(body))).toEqual([]);
    });

    it('ignores assignments on a path that returned', () => {
      const body =
        '    int x;\n    if (c) {\n      x = 1;\n      return;\n    }\n    x = 2;';
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });

    it('handles assignments in both arms of a conditional expression', () => {
      const body = '    int x;\n    int y = c ? (x = 1) : (x = 2);';
      expect(finalNames(inMethod(body))).toEqual(['x', 'y']);
    });

    it('reports a variable assigned once per switch group ending in break', () => {
      const body = [
        '    int x;',
        '    switch (k) {',
        '      case 1:',
        '        x = 1;',
        '        break;',
        '      default:',
        '        x = 2;',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });

    it('ignores a variable assigned again after falling through', () => {
      const body = [
        '    int x;',
        '    switch (k) {',
        '      case 1:',
        '        x = 1;',
        '      default:',
        '        x = 2;',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual([]);
    });

    it('reports a variable assigned once per arrow case', () => {
      const body = [
        '    int x;',
        '    switch (k) {',
        '      case 1 -> x = 1;',
        '      default -> x = 2;',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });

    it('follows a break out of a labeled block', () => {
      const body = [
        '    int x;',
        '    found: {',
        '      if (c) {',
        '        x = 1;',
        '        break found;',
        '      }',
        '      x = 2;',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });
  });

  describe('loops', () => {
    it('ignores a variable assigned inside a loop it was declared outside of', () => {
      expect(
        finalNames(inMethod('    int x;\n    while (c) {\n      x = 1;\n    }'))
      ).toEqual([]);
      expect(
        finalNames(inMethod('    int y;\n    do {\n      y = 1;\n    } while (c);'))
      ).toEqual([]);
    });

    it('reports a variable declared inside a loop body', () => {
      const body = '    while (c) {\n      int y = k;\n      use(y);\n    }';
      expect(finalNames(inMethod(body))).toEqual(['y']);
    });

    it('never reports for-loop initializer variables', () => {
      const body = '    for (int i = 0; i < k; i++) {\n      use(i);\n    }';
      expect(finalNames(inMethod(body))).toEqual([]);
    });

    it('skips enhanced-for variables unless enabled', () => {
      const body = '    for (int item : items) {\n      use(item);\n    }';

      expect(finalNames(inMethod(body))).toEqual([]);
      expect(
        finalNames(inMethod(body), { validateEnhancedForLoopVariable: true })
      ).toEqual(['item']);
    });

    it('does not report an enhanced-for variable declared final', () => {
      const body = '    for (final int item : items) {\n      use(item);\n    }';
      expect(
        finalNames(inMethod(body), { validateEnhancedForLoopVariable: true })
      ).toEqual([]);
    });
  });

  describe('try statements', () => {
    it('ignores a variable assigned in try and again in catch', () => {
      const body = [
        '    int x;',
        '    try {',
        '      x = compute();',
        '    } catch (RuntimeException e) {',
        '      x = 2;',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual([]);
    });

    it('reports a variable assigned once in a try with finally', () => {
      const body = [
        '    int x;',
        '    try {',
        '      x = compute();',
        '    } finally {',
        '      cleanup();',
        '    }',
        '    use(x);',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });

    it('never reports catch parameters or resources', () => {
      const body = [
        '    try (Reader r = open()) {',
        '      use(r);',
        '    } catch (Exception e) {',
        '      e = null;',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual([]);
    });
  });

  describe('catch parameters', () => {
    it('never reports a multi-catch parameter', () => {
      const body = [
        '    try {',
        '      compute();',
        '    } catch (IllegalStateException | IllegalArgumentException e) {',
        '      int code = 1;',
        '      use(e, code);',
        '    }',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual(['code']);
    });
  });

  describe('unnamed variables', () => {
    const body = '    int _ = compute();\n    int y = 1;\n    use(y);';

    it('skips the unnamed variable by default', () => {
      expect(finalNames(inMethod(body))).toEqual(['y']);
    });

    it('reports the unnamed variable when validateUnnamedVariables is set', () => {
      expect(
        finalNames(inMethod(body), { validateUnnamedVariables: true })
      ).toEqual(['_', 'y']);
    });
  });

  describe('lambdas and nested classes', () => {
    it('reports locals of a lambda body', () => {
      const body = '    Runnable r = () -> {\n      int z = 1;\n      use(z);\n    };';
      expect(finalNames(inMethod(body))).toEqual(['r', 'z']);
    });

    it('disqualifies an outer variable assigned inside a lambda', () => {
      const body = '    int x;\n    Runnable r = () -> {\n      x = 1;\n    };';
      expect(finalNames(inMethod(body))).toEqual(['r']);
    });

    it('never reports lambda parameters', () => {
      const body = '    java.util.function.IntUnaryOperator f = v -> {\n      v = v + 1;\n      return v;\n    };';
      expect(finalNames(inMethod(body))).toEqual(['f']);
    });

    it('lets a field of an anonymous class shadow an outer local', () => {
      const body = [
        '    int x = 1;',
        '    use(x);',
        '    new Object() {',
        '      int x;',
        '      void set() {',
        '        x = 5;',
        '      }',
        '    };',
      ].join('\n');
      expect(finalNames(inMethod(body))).toEqual(['x']);
    });

    it('ignores pattern variables', () => {
      const body = '    if (o instanceof String s) {\n      s = "a";\n    }';
      expect(finalNames(inMethod(body))).toEqual([]);
    });
  });

  describe('entries', () => {
    it('analyzes static and instance initializers', () => {
      const source = [
        'class A {',
        '  static {',
        '    int s = 1;',
        '    use(s);',
        '  }',
        '  {',
        '    int t = 2;',
        '    use(t);',
        '  }',
        '}',
        '',
      ].join('\n');
      expect(finalNames(source)).toEqual(['s', 't']);
    });

    it('analyzes constructors', () => {
      const source = 'class A {\n  A() {\n    int n = 3;\n    use(n);\n  }\n}\n';
      expect(finalNames(source)).toEqual(['n']);
    });

    it('reports a variable once even when nested in several entries', () => {
      const source = [
        'class A {',
        '  void m() {',
        '    Runnable r = () -> {',
        '      Runnable inner = () -> {',
        '        int deep = 1;',
        '      };',
        '    };',
        '  }',
        '}',
        '',
      ].join('\n');
      expect(finalNames(source)).toEqual(['r', 'inner', 'deep']);
    });
  });

  describe('configuration', () => {
    it('warns about a malformed boolean option and uses the default', () => {
      const warnings: string[] = [];
      FINAL_LOCAL_VARIABLE.fromConfig(
        new Map([['validateEnhancedForLoopVariable', 'yes']]),
        (warning) => warnings.push(warning.message)
      );
      expect(warnings).toEqual([
        'FinalLocalVariable.validateEnhancedForLoopVariable = "yes": expected true or false, using false',
      ]);
    });
  });
});
