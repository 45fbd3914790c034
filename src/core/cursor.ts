/**
 * Typed little-endian cursor over one chunk's bytes.
 */

import { StructuralError } from "../errors.js";
import { readSafeInt64 } from "./decode.js";

const utf8 = new TextDecoder("utf-8");

export class BinaryCursor {
  private readonly view: DataView;
  private offset: number;

  constructor(
    private readonly bytes: Uint8Array,
    offset = 0,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.bytes.length;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readInt32(): number {
    const at = this.take(4);
    return this.view.getInt32(at, true);
  }

  readInt64(): number {
    const at = this.take(8);
    return readSafeInt64(this.view, at);
  }

  /**
   * Read four bytes as a FourCC tag, e.g. "datx".
   */
  readFourCC(): string {
    const at = this.take(4);
    return String.fromCharCode(...this.bytes.subarray(at, at + 4));
  }

  /**
   * Read a NUL-terminated UTF-8 string. A string running to the end of the
   * chunk without a terminator is accepted.
   */
  readCString(): string {
    const start = this.offset;
    let end = this.bytes.indexOf(0, start);
    if (end === -1) end = this.bytes.length;
    this.offset = Math.min(end + 1, this.bytes.length);
    return utf8.decode(this.bytes.subarray(start, end));
  }

  private take(size: number): number {
    const at = this.offset;
    if (at + size > this.bytes.length) {
      throw new StructuralError(
        `Read of ${size} bytes at ${at} overruns chunk of ${this.bytes.length} bytes`,
        { value: at },
      );
    }
    this.offset += size;
    return at;
  }
}
