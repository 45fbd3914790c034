/**
 * Chunk framing for HPF binary files.
 *
 * An HPF file is a sequence of chunks, each starting with a 16-byte prefix:
 * - 8 bytes: chunk kind (int64, little-endian)
 * - 8 bytes: chunk length in bytes, prefix included (int64, little-endian)
 * The chunk body re-reads the prefix as its first two fields.
 */

import { StructuralError } from "../errors.js";
import { hex } from "../log.js";

export const CHUNK_PREFIX_SIZE = 16;

/** Largest chunk the reader will buffer (1 MiB). Recorders write 64 KiB. */
export const DEFAULT_MAX_CHUNK_SIZE = 1024 * 1024;

export enum ChunkKind {
  Header = 0x1000,
  ChannelInfo = 0x2000,
  Data = 0x3000,
  EventDefinition = 0x4000,
  EventData = 0x5000,
  Index = 0x6000,
}

const CHUNK_KIND_NAMES: Record<ChunkKind, string> = {
  [ChunkKind.Header]: "header",
  [ChunkKind.ChannelInfo]: "channelinfo",
  [ChunkKind.Data]: "data",
  [ChunkKind.EventDefinition]: "eventdefinition",
  [ChunkKind.EventData]: "eventdata",
  [ChunkKind.Index]: "index",
};

export interface ChunkPrefix {
  kind: ChunkKind;
  length: number;
}

export function isChunkKind(value: number): value is ChunkKind {
  return Object.prototype.hasOwnProperty.call(CHUNK_KIND_NAMES, value);
}

/**
 * Human-readable chunk kind, e.g. "channelinfo", or "unknown_0x7000".
 */
export function chunkKindName(kind: number): string {
  return isChunkKind(kind) ? CHUNK_KIND_NAMES[kind] : `unknown_${hex(kind)}`;
}

/**
 * Read a little-endian int64 as a number, rejecting values outside the
 * safe-integer range.
 */
export function readSafeInt64(view: DataView, offset: number): number {
  const value = view.getBigInt64(offset, true);
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new StructuralError(`64-bit field out of range: ${value}`, {
      value,
    });
  }
  return Number(value);
}

/**
 * Parse and validate a chunk prefix.
 */
export function parseChunkPrefix(
  data: Uint8Array,
  fileOffset: number,
  maxChunkSize: number,
): ChunkPrefix {
  if (data.length < CHUNK_PREFIX_SIZE) {
    throw new StructuralError(
      `Data too short for chunk prefix: ${data.length} < ${CHUNK_PREFIX_SIZE}`,
      { fileOffset },
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, CHUNK_PREFIX_SIZE);
  const kind = readSafeInt64(view, 0);
  const length = readSafeInt64(view, 8);

  if (!isChunkKind(kind)) {
    throw new StructuralError(`Unknown chunk kind ${hex(kind)}`, {
      chunkKind: chunkKindName(kind),
      fileOffset,
      value: kind,
    });
  }

  if (length > maxChunkSize) {
    throw new StructuralError(
      `Buffer size ${hex(maxChunkSize)} is too small for chunk size ${hex(length)}`,
      { chunkKind: chunkKindName(kind), fileOffset, value: length },
    );
  }

  // A length shorter than the prefix would never advance the reader
  if (length < CHUNK_PREFIX_SIZE) {
    throw new StructuralError(`Chunk length ${length} is shorter than its prefix`, {
      chunkKind: chunkKindName(kind),
      fileOffset,
      value: length,
    });
  }

  return { kind, length };
}
