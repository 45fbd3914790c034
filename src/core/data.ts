/**
 * Data chunk decoding and unit conversion.
 *
 * Layout after the 16-byte prefix:
 * - int32 group id
 * - int64 index of the first sample in this chunk
 * - int32 channel data count
 * - per channel: int32 offset, int32 length (bytes, offset from chunk start)
 * - packed sample runs, one per channel
 */

import { ConsistencyError, StructuralError } from "../errors.js";
import { BinaryCursor } from "./cursor.js";
import { CHUNK_PREFIX_SIZE } from "./decode.js";
import type { ChannelInfo, ChannelLayout, ChannelMetadata, DataChunk } from "./types.js";

/**
 * Read the per-channel descriptor table and derive each run's sample count.
 */
function readLayout(cursor: BinaryCursor, info: ChannelInfo): ChannelLayout[] {
  const channelDataCount = cursor.readInt32();
  if (channelDataCount !== info.channels.length) {
    throw new ConsistencyError(
      `Data chunk describes ${channelDataCount} channels, ChannelInfo declares ${info.channels.length}`,
      { value: channelDataCount },
    );
  }

  return info.channels.map((channel, i) => {
    const offset = cursor.readInt32();
    const length = cursor.readInt32();
    const atomSize = channel.dataType.size;

    if (offset < 0 || length < 0 || offset + length > cursor.length) {
      throw new StructuralError(
        `Channel ${i} samples at offset ${offset} length ${length} fall outside chunk of ${cursor.length} bytes`,
        { value: offset },
      );
    }
    if (length % atomSize !== 0) {
      throw new StructuralError(
        `Channel ${i} run of ${length} bytes is not a multiple of ${channel.dataType.name} size ${atomSize}`,
        { value: length },
      );
    }

    return { channel: i, offset, length, atomSize, sampleCount: length / atomSize };
  });
}

/**
 * Decode a Data chunk against the channel layout fixed by ChannelInfo.
 * Samples are copied out, so the result does not alias `payload`.
 */
export function decodeData(payload: Uint8Array, info: ChannelInfo): DataChunk {
  const cursor = new BinaryCursor(payload, CHUNK_PREFIX_SIZE);
  const groupId = cursor.readInt32();
  if (groupId !== info.groupId) {
    throw new ConsistencyError(
      `groupid as recorded in data chunk ${groupId} does not match groupid as recorded in channelinfo ${info.groupId}`,
      { value: groupId },
    );
  }
  const dataStartIndex = cursor.readInt64();
  const layout = readLayout(cursor, info);

  const expected = layout.length > 0 ? layout[0].sampleCount : 0;
  for (const run of layout) {
    if (run.sampleCount !== expected) {
      throw new ConsistencyError(
        `Channel ${run.channel} has ${run.sampleCount} samples, channel 0 has ${expected}`,
        { value: run.sampleCount },
      );
    }
  }

  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  const samples = layout.map((run) => {
    const { dataType } = info.channels[run.channel];
    const out = new Float64Array(run.sampleCount);
    for (let j = 0; j < run.sampleCount; j++) {
      out[j] = dataType.read(view, run.offset + j * run.atomSize);
    }
    return out;
  });

  return { groupId, dataStartIndex, layout, samples };
}

/** Scale a raw sample into physical units. */
export function toPhysical(channel: ChannelMetadata, raw: number): number {
  return raw * channel.dataScale + channel.dataOffset;
}
