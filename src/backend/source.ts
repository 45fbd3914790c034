/**
 * Positional byte sources the chunk reader pulls from.
 */

export interface ByteSource {
  readonly kind: string;
  /** Total size in bytes. */
  readonly size: number;
  /**
   * Fill `target` with bytes starting at `position`.
   * Returns the number of bytes read, fewer than requested at end of data.
   */
  readInto(target: Uint8Array, position: number): number;
  close?(): void;
}
