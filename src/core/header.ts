/**
 * Header chunk decoding.
 *
 * Layout after the 16-byte prefix:
 * - int32 creator FourCC
 * - int64 file version
 * - int64 offset of the trailing index chunk
 * - NUL-terminated XML: <RecordingDate>...</RecordingDate>
 */

import { requireRoot } from "../xml/document.js";
import { BinaryCursor } from "./cursor.js";
import { CHUNK_PREFIX_SIZE } from "./decode.js";
import { parseTimestamp } from "./time.js";
import type { FileHeader } from "./types.js";

const HEADER_ROOT = "RecordingDate";

export function decodeHeader(payload: Uint8Array): FileHeader {
  const cursor = new BinaryCursor(payload, CHUNK_PREFIX_SIZE);
  const creatorId = cursor.readFourCC();
  const fileVersion = cursor.readInt64();
  const indexChunkOffset = cursor.readInt64();
  const xml = cursor.readCString();

  const root = requireRoot(xml, HEADER_ROOT);
  const recordingDate = root.text();

  return {
    creatorId,
    fileVersion,
    indexChunkOffset,
    recordingDate,
    recordingTime: parseTimestamp(recordingDate),
  };
}
