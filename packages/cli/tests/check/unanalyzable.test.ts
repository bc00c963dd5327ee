/**
 * Unanalyzable Source Tests
 * A parser that produces no tree stops analysis of that file only.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ParseOutcome } from '@jstyle/core';
import {
  checkFiles,
  checkSource,
  createDefaultConfig,
  createRules,
} from '../../src/check/index.js';

vi.mock('@jstyle/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@jstyle/core')>();
  return {
    ...actual,
    tryParseJava: (): ParseOutcome => ({
      ok: false,
      error: new Error('grammar unavailable'),
    }),
  };
});

describe('checkSource without a tree', () => {
  it('reports the source as unanalyzable with no diagnostics', () => {
    const { rules } = createRules(createDefaultConfig());

    expect(checkSource('import java.util.Map;\nclass A { }\n', rules)).toEqual({
      status: 'unanalyzable',
      reason: 'grammar unavailable',
      diagnostics: [],
    });
  });
});

describe('checkFiles without a tree', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'jstyle-noparse-'));
    await fs.writeFile(path.join(tempDir, 'A.java'), 'class A { }\n');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('keeps the source and reason of an unanalyzable file', async () => {
    const file = path.join(tempDir, 'A.java');
    const [report] = await checkFiles([file], []);

    expect(report).toEqual({
      path: file,
      source: 'class A { }\n',
      status: 'unanalyzable',
      reason: 'grammar unavailable',
      diagnostics: [],
    });
  });
});
