/**
 * Trailing index of the recording.
 *
 * Layout after the 16-byte prefix: int64 entry count, then per entry five
 * int64 fields (data start index, per-channel length in samples, chunk kind,
 * group id, file offset).
 *
 * The index is collected for completeness; decoding never seeks through it.
 */

import { StructuralError } from "../errors.js";
import { BinaryCursor } from "./cursor.js";
import { CHUNK_PREFIX_SIZE } from "./decode.js";
import type { IndexEntry } from "./types.js";

export class IndexTable {
  private readonly items: IndexEntry[] = [];

  append(entry: IndexEntry): void {
    this.items.push(entry);
  }

  get entries(): readonly IndexEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }
}

export function decodeIndex(payload: Uint8Array): IndexEntry[] {
  const cursor = new BinaryCursor(payload, CHUNK_PREFIX_SIZE);
  const count = cursor.readInt64();
  if (count < 0) {
    throw new StructuralError(`Negative index entry count ${count}`, { value: count });
  }

  const entries: IndexEntry[] = [];
  for (let i = 0; i < count; i++) {
    entries.push({
      dataStartIndex: cursor.readInt64(),
      perChannelLengthInSamples: cursor.readInt64(),
      chunkKind: cursor.readInt64(),
      groupId: cursor.readInt64(),
      fileOffset: cursor.readInt64(),
    });
  }
  return entries;
}
