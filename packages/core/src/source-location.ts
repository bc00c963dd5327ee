// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-indexed line and column plus the offset into the source string */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Half-open offset range `[start, end)` into the source string */
export interface TextRange {
  readonly start: number;
  readonly end: number;
}

/** True when the two half-open ranges share at least one offset */
export function rangesOverlap(a: TextRange, b: TextRange): boolean {
  return a.start < b.end && a.end > b.start;
}

// ============================================================
// LINE INDEX
// ============================================================

/**
 * Maps offsets to line/column positions.
 *
 * Line starts are computed once per source. `\n` terminates a line and
 * `\r\n` counts as a single terminator, so a `\r` never starts a line.
 */
export class LineIndex {
  private constructor(
    private readonly source: string,
    private readonly lineStarts: readonly number[]
  ) {}

  static fromSource(source: string): LineIndex {
    const starts = [0];
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        starts.push(i + 1);
      }
    }
    return new LineIndex(source, starts);
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Offsets outside the source clamp to its bounds. */
  locate(offset: number): SourceLocation {
    const clamped = Math.max(0, Math.min(offset, this.source.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    const lineStart = this.lineStarts[low] ?? 0;
    return { line: low + 1, column: clamped - lineStart + 1, offset: clamped };
  }

  span(range: TextRange): SourceSpan {
    return { start: this.locate(range.start), end: this.locate(range.end) };
  }

  /** Offset of the first character of a 1-indexed line */
  lineStart(line: number): number {
    return this.lineStarts[line - 1] ?? this.source.length;
  }

  /** Text of a 1-indexed line without its terminator; empty when out of range */
  lineText(line: number): string {
    if (line < 1 || line > this.lineStarts.length) {
      return '';
    }
    const start = this.lineStart(line);
    let end =
      line < this.lineStarts.length
        ? this.lineStart(line + 1) - 1
        : this.source.length;
    if (end > start && this.source.charCodeAt(end - 1) === 13) {
      end--;
    }
    return this.source.slice(start, end);
  }

  /** Leading spaces and tabs of a 1-indexed line */
  indentOf(line: number): string {
    const text = this.lineText(line);
    const match = /^[ \t]*/.exec(text);
    return match ? match[0] : '';
  }
}
