/**
 * Utility for formatting byte values in log lines
 */
export class ByteFormatter {
  private static readonly GB = 1024 * 1024 * 1024;
  private static readonly MB = 1024 * 1024;
  private static readonly KB = 1024;

  /**
   * Formats bytes to MB with 2 decimal places
   */
  static toMB(bytes: number): string {
    return `${(bytes / this.MB).toFixed(2)} MB`;
  }

  static toHumanReadable(bytes: number): string {
    if (bytes >= this.GB) {
      return `${(bytes / this.GB).toFixed(2)} GB`;
    }
    if (bytes >= this.MB) {
      return `${(bytes / this.MB).toFixed(2)} MB`;
    }
    if (bytes >= this.KB) {
      return `${(bytes / this.KB).toFixed(2)} KB`;
    }
    return `${bytes} B`;
  }

  /**
   * Formats a multiplier as x1.234
   */
  static toMultiplier(value: number): string {
    return `x${value.toFixed(3)}`;
  }
}
