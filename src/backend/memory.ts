import type { ByteSource } from "./source.js";

/**
 * Byte source over an in-memory buffer.
 */
export class MemoryByteSource implements ByteSource {
  public readonly kind = "memory";

  constructor(private readonly data: Uint8Array) {}

  get size(): number {
    return this.data.length;
  }

  readInto(target: Uint8Array, position: number): number {
    const start = Math.max(0, Math.min(this.data.length, Math.floor(position)));
    const end = Math.min(this.data.length, start + target.length);
    target.set(this.data.subarray(start, end));
    return end - start;
  }
}
