/**
 * Core type definitions for HPF data structures.
 */

import type { ChunkKind } from "./decode.js";
import type { SampleType } from "./datatype.js";

/** One length-prefixed record as read from the file. */
export interface Chunk {
  kind: ChunkKind;
  /** Total length in bytes, prefix included */
  length: number;
  fileOffset: number;
  /** Chunk bytes, prefix included. Only valid until the next chunk is read. */
  payload: Uint8Array;
}

/** Recording timestamp decomposed positionally; all zero when unset. */
export interface Timestamp {
  text: string;
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Digits after the seconds field, as an integer */
  subSecond: number;
  /** Seconds including their fractional part */
  fractionalSeconds: number;
}

export interface FileHeader {
  /** FourCC of the writing application, e.g. "datx" */
  creatorId: string;
  fileVersion: number;
  /** File offset of the trailing index chunk */
  indexChunkOffset: number;
  recordingDate: string;
  recordingTime: Timestamp;
}

/** Per-channel metadata from the ChannelInfo chunk. */
export interface ChannelMetadata {
  /** Column index: position in the ChannelInfo document */
  index: number;
  name: string;
  unit: string;
  channelType: string;
  assignedTimeChannelIndex: number;
  dataType: SampleType;
  /** Channel number as declared in the document */
  dataIndex: number;
  startTime: Timestamp;
  timeIncrement: number;
  rangeMin: number;
  rangeMax: number;
  dataScale: number;
  dataOffset: number;
  sensorScale: number;
  sensorOffset: number;
  perChannelSampleRate: number;
  physicalChannelNumber: number;
  usesSensorValues: boolean;
  thermocoupleType?: string;
  temperatureUnit?: string;
  useThermocoupleValues?: boolean;
}

export interface ChannelInfo {
  groupId: number;
  channels: ChannelMetadata[];
}

/** Where one channel's samples live inside a Data chunk. */
export interface ChannelLayout {
  channel: number;
  /** Byte offset from the start of the chunk */
  offset: number;
  length: number;
  atomSize: number;
  sampleCount: number;
}

export interface DataChunk {
  groupId: number;
  dataStartIndex: number;
  layout: ChannelLayout[];
  /** Raw samples per channel, in ChannelInfo order */
  samples: Float64Array[];
}

export type EventType = "Point" | "Ranged";

export interface EventDefinition {
  index: number;
  name: string;
  description: string;
  eventClass: number;
  id: number;
  type: EventType;
  usesIData1: boolean;
  usesIData2: boolean;
  usesDData1: boolean;
  usesDData2: boolean;
  usesDData3: boolean;
  usesDData4: boolean;
  descriptionIData1: string;
  descriptionIData2: string;
  descriptionDData1: string;
  descriptionDData2: string;
  descriptionDData3: string;
  descriptionDData4: string;
  parameter1: string;
  parameter2: string;
  tolerance: string;
  usesParameter1: boolean;
  usesParameter2: boolean;
  usesTolerance: boolean;
  descriptionParameter1: string;
  descriptionParameter2: string;
  descriptionTolerance: string;
}

export interface IndexEntry {
  dataStartIndex: number;
  perChannelLengthInSamples: number;
  /** Raw kind of the chunk the entry points at */
  chunkKind: number;
  groupId: number;
  fileOffset: number;
}
