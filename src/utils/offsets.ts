/**
 * Character Offset Utilities
 * Maps character offsets to line numbers and orders positioned results
 */

/**
 * Newline offsets of a document, computed once and searched per lookup
 */
export class LineIndex {
  private readonly newlines: number[];

  constructor(text: string) {
    const newlines: number[] = [];
    let position = text.indexOf('\n');
    while (position !== -1) {
      newlines.push(position);
      position = text.indexOf('\n', position + 1);
    }
    this.newlines = newlines;
  }

  /** Number of lines in the document (a trailing newline opens an empty line) */
  get lineCount(): number {
    return this.newlines.length + 1;
  }

  /**
   * 1-based line number of the character at `offset`:
   * one plus the count of newlines strictly before it
   */
  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.newlines.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const newline = this.newlines[mid];
      if (newline !== undefined && newline < offset) lo = mid + 1;
      else hi = mid;
    }
    return lo + 1;
  }
}

/**
 * Orders results by line, then start offset, then end offset
 */
export function compareByPosition<T extends { lineNumber: number; startOffset: number; endOffset: number }>(
  a: T,
  b: T
): number {
  return a.lineNumber - b.lineNumber || a.startOffset - b.startOffset || a.endOffset - b.endOffset;
}
