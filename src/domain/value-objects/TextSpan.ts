/**
 * Immutable half-open span [start, end) inside a request target string
 */
export class TextSpan {
  constructor(
    public readonly start: number,
    public readonly end: number
  ) {
    if (start < 0 || end < start) {
      throw new Error(`TextSpan: expected 0 <= start <= end, got start=${start}, end=${end}`);
    }
  }

  get length(): number {
    return this.end - this.start;
  }

  /**
   * Returns the covered slice of text
   */
  sliceOf(text: string): string {
    return text.slice(this.start, this.end);
  }

  /**
   * Substitutes the covered slice, leaving every other character in place
   */
  replaceIn(text: string, replacement: string): string {
    if (this.end > text.length) {
      throw new Error(`TextSpan: span ends at ${this.end} but text has ${text.length} characters`);
    }
    return text.slice(0, this.start) + replacement + text.slice(this.end);
  }
}
