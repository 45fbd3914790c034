/**
 * File backend for reading HPF recordings.
 *
 * Reads are synchronous and positional, so only one chunk is ever resident.
 */

import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import type { ByteSource } from "./source.js";

export class FileByteSource implements ByteSource {
  public readonly kind = "file";
  public readonly size: number;
  private fd: number | null;

  constructor(readonly path: string) {
    this.fd = openSync(path, "r");
    this.size = fstatSync(this.fd).size;
  }

  readInto(target: Uint8Array, position: number): number {
    if (this.fd === null) {
      throw new Error(`File already closed: ${this.path}`);
    }

    let filled = 0;
    // readSync may return short counts before EOF
    while (filled < target.length) {
      const n = readSync(this.fd, target, filled, target.length - filled, position + filled);
      if (n === 0) break;
      filled += n;
    }
    return filled;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}
