/**
 * hpf-table - streaming decoder for HPF data-acquisition recordings.
 *
 * Turns chunked binary recordings into physically-scaled delimited tables,
 * one chunk at a time.
 *
 * @packageDocumentation
 */

// Main reader class
export { HpfReader } from "./reader.js";
export type { HpfReaderOptions, ConversionSummary } from "./reader.js";

// Core types
export type {
  Chunk,
  FileHeader,
  Timestamp,
  ChannelInfo,
  ChannelMetadata,
  ChannelLayout,
  DataChunk,
  EventDefinition,
  EventType,
  IndexEntry,
} from "./core/types.js";
export type { SampleType, SampleTypeName } from "./core/datatype.js";

// Errors
export {
  HpfError,
  StructuralError,
  SchemaError,
  ConsistencyError,
} from "./errors.js";
export type { ErrorContext } from "./errors.js";

// Byte sources
export type { ByteSource } from "./backend/source.js";
export { FileByteSource } from "./backend/file.js";
export { MemoryByteSource } from "./backend/memory.js";

// Output
export { TableEmitter } from "./output/table.js";
export type { TableOptions, TableSink } from "./output/table.js";
export { formatSignificant } from "./encoding/number-format.js";

export { Logger } from "./log.js";

// Low-level APIs for advanced usage
export {
  ChunkKind,
  chunkKindName,
  parseChunkPrefix,
  CHUNK_PREFIX_SIZE,
  DEFAULT_MAX_CHUNK_SIZE,
} from "./core/decode.js";
export { ChunkReader } from "./core/chunk-reader.js";
export { BinaryCursor } from "./core/cursor.js";
export { decodeHeader } from "./core/header.js";
export { decodeChannelInfo } from "./core/channel-info.js";
export { decodeData, toPhysical } from "./core/data.js";
export { decodeEventDefinitions, decodeEventCount } from "./core/event.js";
export { decodeIndex, IndexTable } from "./core/index-table.js";
export { findSampleType } from "./core/datatype.js";
export { parseTimestamp, formatTimestamp, isZeroTimestamp } from "./core/time.js";
export { parseXmlDocument } from "./xml/document.js";
export type { XmlDocument, XmlElement } from "./xml/document.js";
