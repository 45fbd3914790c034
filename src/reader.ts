/**
 * HpfReader - streaming converter from HPF recordings to delimited tables.
 *
 * Walks the chunks of a recording in file order, keeps the metadata the
 * Data chunks depend on, and writes table rows as each Data chunk arrives.
 */

import { FileByteSource } from "./backend/file.js";
import type { ByteSource } from "./backend/source.js";
import { decodeChannelInfo } from "./core/channel-info.js";
import { ChunkReader } from "./core/chunk-reader.js";
import { decodeData } from "./core/data.js";
import { ChunkKind, chunkKindName, CHUNK_PREFIX_SIZE, DEFAULT_MAX_CHUNK_SIZE } from "./core/decode.js";
import { decodeEventCount, decodeEventDefinitions } from "./core/event.js";
import { decodeHeader } from "./core/header.js";
import { decodeIndex, IndexTable } from "./core/index-table.js";
import { formatTimestamp } from "./core/time.js";
import type { ChannelInfo, ChannelMetadata, Chunk, FileHeader, IndexEntry } from "./core/types.js";
import { ConsistencyError, HpfError } from "./errors.js";
import { hex, Logger } from "./log.js";
import { TableEmitter, type TableSink } from "./output/table.js";

/**
 * Options for an HpfReader.
 */
export interface HpfReaderOptions {
  /** Emit only every Nth sample (default: true) */
  downsample?: boolean;
  /** N for downsampling (default: 1000) */
  downsampleFactor?: number;
  /** Prefix each row with its 1-based sample number (default: false) */
  includeSampleIndex?: boolean;
  /** Field separator (default: tab) */
  separator?: string;
  /** Largest chunk accepted, in bytes (default: 1 MiB) */
  maxChunkSize?: number;
  /** Emit the recording and channel summary before the column header (default: true) */
  preamble?: boolean;
  /** Write table rows; when false the file is only decoded and validated (default: true) */
  table?: boolean;
  /** Diagnostic verbosity, 0 for none (default: 0) */
  verbosity?: number;
  /** Diagnostic logger; overrides `verbosity` */
  logger?: Logger;
}

type ResolvedOptions = Required<Omit<HpfReaderOptions, "logger" | "verbosity">>;

/** Totals for a finished conversion. */
export interface ConversionSummary {
  chunks: number;
  dataChunks: number;
  /** Samples per channel decoded from Data chunks */
  samples: number;
  /** Table rows written */
  rows: number;
  indexEntries: number;
  eventDefinitions: number;
  events: number;
}

function resolveOptions(options: HpfReaderOptions): ResolvedOptions {
  const resolved: ResolvedOptions = {
    downsample: options.downsample ?? true,
    downsampleFactor: options.downsampleFactor ?? 1000,
    includeSampleIndex: options.includeSampleIndex ?? false,
    separator: options.separator ?? "\t",
    maxChunkSize: options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE,
    preamble: options.preamble ?? true,
    table: options.table ?? true,
  };

  if (!Number.isInteger(resolved.downsampleFactor) || resolved.downsampleFactor < 1) {
    throw new RangeError(
      `downsampleFactor must be a positive integer, got ${resolved.downsampleFactor}`,
    );
  }
  if (!Number.isInteger(resolved.maxChunkSize) || resolved.maxChunkSize < CHUNK_PREFIX_SIZE) {
    throw new RangeError(
      `maxChunkSize must be an integer of at least ${CHUNK_PREFIX_SIZE}, got ${resolved.maxChunkSize}`,
    );
  }
  return resolved;
}

type ChunkHandler = (chunk: Chunk, sink: TableSink) => void;

/**
 * HpfReader - decodes one recording, front to back.
 *
 * @example
 * ```typescript
 * import { HpfReader } from "hpf-table";
 *
 * const reader = HpfReader.open("run-42.hpf", { downsampleFactor: 100 });
 * try {
 *   reader.convert({ write: (text) => process.stdout.write(text) });
 * } finally {
 *   reader.close();
 * }
 * ```
 */
export class HpfReader {
  private readonly options: ResolvedOptions;
  private readonly logger: Logger;
  private readonly chunks: ChunkReader;
  private readonly handlers: Record<ChunkKind, ChunkHandler>;
  private readonly index = new IndexTable();

  private header: FileHeader | null = null;
  private channelInfo: ChannelInfo | null = null;
  private emitter: TableEmitter | null = null;
  private indexSeen = false;
  private eventDefinitionCount: number | null = null;
  private eventCount = 0;
  private chunkCount = 0;
  private dataChunkCount = 0;
  private sampleCount = 0;

  constructor(
    private readonly source: ByteSource,
    options: HpfReaderOptions = {},
  ) {
    this.options = resolveOptions(options);
    this.logger = options.logger ?? new Logger(options.verbosity ?? 0);
    this.chunks = new ChunkReader(source, this.options.maxChunkSize, this.logger);
    this.handlers = {
      [ChunkKind.Header]: (chunk) => this.onHeader(chunk),
      [ChunkKind.ChannelInfo]: (chunk) => this.onChannelInfo(chunk),
      [ChunkKind.Data]: (chunk, sink) => this.onData(chunk, sink),
      [ChunkKind.EventDefinition]: (chunk) => this.onEventDefinition(chunk),
      [ChunkKind.EventData]: (chunk) => this.onEventData(chunk),
      [ChunkKind.Index]: (chunk) => this.onIndex(chunk),
    };
  }

  /**
   * Open a recording on disk.
   */
  static open(path: string, options: HpfReaderOptions = {}): HpfReader {
    const source = new FileByteSource(path);
    try {
      return new HpfReader(source, options);
    } catch (err) {
      source.close();
      throw err;
    }
  }

  /**
   * Decode the next chunk, writing any table text it produces to `sink`.
   * Returns the kind of the chunk decoded, or `null` at end of stream.
   */
  readChunk(sink: TableSink): ChunkKind | null {
    const chunk = this.chunks.next();
    if (!chunk) return null;

    this.chunkCount++;
    try {
      this.handlers[chunk.kind](chunk, sink);
    } catch (err) {
      if (err instanceof HpfError) {
        throw err.atChunk(chunkKindName(chunk.kind), chunk.fileOffset);
      }
      throw err;
    }
    return chunk.kind;
  }

  /**
   * Decode every remaining chunk into `sink`.
   */
  convert(sink: TableSink): ConversionSummary {
    while (this.readChunk(sink) !== null) {
      // each call handles one chunk
    }
    return this.summary();
  }

  summary(): ConversionSummary {
    return {
      chunks: this.chunkCount,
      dataChunks: this.dataChunkCount,
      samples: this.sampleCount,
      rows: this.emitter?.rowsEmitted ?? 0,
      indexEntries: this.index.size,
      eventDefinitions: this.eventDefinitionCount ?? 0,
      events: this.eventCount,
    };
  }

  getHeader(): FileHeader | null {
    return this.header;
  }

  getGroupId(): number | null {
    return this.channelInfo?.groupId ?? null;
  }

  listChannels(): readonly ChannelMetadata[] {
    return this.channelInfo?.channels ?? [];
  }

  getIndex(): readonly IndexEntry[] {
    return this.index.entries;
  }

  close(): void {
    this.source.close?.();
  }

  private onHeader(chunk: Chunk): void {
    if (this.header) {
      this.logger.trace(
        1,
        "HpfReader.onHeader",
        `ignoring header chunk at ${hex(chunk.fileOffset)}, keeping the first`,
      );
      return;
    }
    this.header = decodeHeader(chunk.payload);
    this.logger.trace(
      2,
      "HpfReader.onHeader",
      `creatorid='${this.header.creatorId}' fileversion=${hex(this.header.fileVersion)} ` +
        `indexchunkoffset=${hex(this.header.indexChunkOffset)} ` +
        `recordingdate=${this.header.recordingDate} (${formatTimestamp(this.header.recordingTime)})`,
    );
  }

  private onChannelInfo(chunk: Chunk): void {
    if (this.channelInfo) {
      throw new ConsistencyError(
        `channelinfo already defined with ${this.channelInfo.channels.length} channels`,
      );
    }
    this.channelInfo = decodeChannelInfo(chunk.payload);

    const { groupId, channels } = this.channelInfo;
    this.logger.trace(
      2,
      "HpfReader.onChannelInfo",
      `groupid=${groupId} channels=${channels.map((c) => `${c.name}:${c.dataType.name}`).join(", ")}`,
    );
    if (this.logger.enabled(3)) {
      for (const c of channels) {
        this.logger.trace(
          3,
          "HpfReader.onChannelInfo",
          `${c.index} name=${c.name} unit=${c.unit} scale=${c.dataScale} offset=${c.dataOffset} ` +
            `rate=${c.perChannelSampleRate} range=[${c.rangeMin}, ${c.rangeMax}]`,
        );
      }
    }
  }

  private onData(chunk: Chunk, sink: TableSink): void {
    const info = this.channelInfo;
    if (!info) {
      throw new ConsistencyError("Data chunk before channelinfo");
    }

    const data = decodeData(chunk.payload, info);
    const perChannel = data.samples.length > 0 ? data.samples[0].length : 0;
    this.dataChunkCount++;
    this.sampleCount += perChannel;

    this.logger.trace(
      2,
      "HpfReader.onData",
      `groupid=${data.groupId} datastartindex=${data.dataStartIndex} samples=${perChannel}`,
    );
    if (this.logger.enabled(3)) {
      for (const run of data.layout) {
        this.logger.trace(
          3,
          "HpfReader.onData",
          `channel ${run.channel} offset=${hex(run.offset)} length=${hex(run.length)} ` +
            `atom=${run.atomSize} samples=${run.sampleCount}`,
        );
      }
    }

    if (!this.options.table) return;

    if (!this.emitter) {
      this.emitter = new TableEmitter(this.header, info.channels, this.options);
    }
    const text = this.emitter.renderChunk(data);
    if (text.length > 0) sink.write(text);
  }

  private onEventDefinition(chunk: Chunk): void {
    if (this.eventDefinitionCount !== null) {
      throw new ConsistencyError("eventdefinition already defined");
    }
    const definitions = decodeEventDefinitions(chunk.payload);
    this.eventDefinitionCount = definitions.length;
    this.logger.trace(
      2,
      "HpfReader.onEventDefinition",
      `${definitions.length} event definitions: ` +
        definitions.map((d) => `${d.index}:${d.eventClass}:${d.id}:${d.type}`).join(", "),
    );
  }

  private onEventData(chunk: Chunk): void {
    const count = decodeEventCount(chunk.payload);
    this.eventCount += count;
    this.logger.trace(2, "HpfReader.onEventData", `eventcount=${count} (discarded)`);
  }

  private onIndex(chunk: Chunk): void {
    if (this.indexSeen) {
      throw new ConsistencyError("index chunk already seen");
    }
    this.indexSeen = true;
    for (const entry of decodeIndex(chunk.payload)) {
      this.index.append(entry);
    }
    this.logger.trace(2, "HpfReader.onIndex", `there are a total of ${this.index.size} index entries now`);
  }
}
