/**
 * Sequential chunk reader over a byte source.
 */

import type { ByteSource } from "../backend/source.js";
import { hex, Logger } from "../log.js";
import {
  CHUNK_PREFIX_SIZE,
  chunkKindName,
  DEFAULT_MAX_CHUNK_SIZE,
  parseChunkPrefix,
} from "./decode.js";
import type { Chunk } from "./types.js";

export class ChunkReader {
  private readonly prefix = new Uint8Array(CHUNK_PREFIX_SIZE);
  private readonly buffer: Uint8Array;
  private position = 0;
  private ended = false;

  constructor(
    private readonly source: ByteSource,
    readonly maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE,
    private readonly logger: Logger = new Logger(),
  ) {
    this.buffer = new Uint8Array(maxChunkSize);
  }

  /** File offset of the next chunk. */
  get offset(): number {
    return this.position;
  }

  /**
   * Read the next chunk, or `null` at end of stream.
   *
   * The returned payload aliases an internal buffer that the next call
   * overwrites.
   */
  next(): Chunk | null {
    if (this.ended) return null;

    const here = this.position;
    const got = this.source.readInto(this.prefix, here);
    if (got < CHUNK_PREFIX_SIZE) {
      this.logger.trace(
        1,
        "ChunkReader.next",
        `could only read ${got} bytes at ${hex(here)}, end of stream`,
      );
      return this.finish();
    }

    const { kind, length } = parseChunkPrefix(this.prefix, here, this.maxChunkSize);

    // Re-read from the same position: the body starts with the prefix
    const payload = this.buffer.subarray(0, length);
    const read = this.source.readInto(payload, here);
    if (read < length) {
      this.logger.trace(
        1,
        "ChunkReader.next",
        `truncated ${chunkKindName(kind)} chunk at ${hex(here)}: ${read} of ${length} bytes, end of stream`,
      );
      return this.finish();
    }

    this.position = here + length;
    this.logger.trace(
      1,
      "ChunkReader.next",
      `offset=${hex(here)} kind=${chunkKindName(kind)} length=${hex(length)}`,
    );

    return { kind, length, fileOffset: here, payload };
  }

  private finish(): null {
    this.ended = true;
    return null;
  }
}
