/**
 * Delimited-text rendering of decoded samples.
 *
 * The emitter keeps running counters across Data chunks so downsampling
 * picks every Nth sample of the whole recording, not of each chunk.
 */

import { ConsistencyError } from "../errors.js";
import { toPhysical } from "../core/data.js";
import type { ChannelMetadata, DataChunk, FileHeader } from "../core/types.js";
import { formatSignificant } from "../encoding/number-format.js";

export interface TableOptions {
  /** Emit only every `downsampleFactor`-th sample */
  downsample: boolean;
  downsampleFactor: number;
  /** Prefix each row with its 1-based sample number, counted across chunks */
  includeSampleIndex: boolean;
  separator: string;
  /** Emit the recording and channel summary before the column header */
  preamble: boolean;
}

/** Destination for rendered table text. */
export interface TableSink {
  write(text: string): void;
}

const CHANNEL_SUMMARY_COLUMNS = [
  "ChannelName",
  "ChannelNumber",
  "Units",
  "DataType",
  "RangeMin",
  "RangeMax",
  "DataScale",
  "DataOffset",
  "SensorScale",
  "SensorOffset",
];

export class TableEmitter {
  /** Samples seen so far */
  private dataLines = 0;
  /** Rows written so far */
  private tableDataLines = 0;
  private headerWritten = false;

  constructor(
    private readonly header: FileHeader | null,
    private readonly channels: readonly ChannelMetadata[],
    private readonly options: TableOptions,
  ) {}

  get samplesSeen(): number {
    return this.dataLines;
  }

  get rowsEmitted(): number {
    return this.tableDataLines;
  }

  /**
   * Render the column header, preceded by the preamble when enabled.
   */
  renderHeader(): string {
    const sep = this.options.separator;
    const lines: string[] = [];

    if (this.options.preamble) {
      lines.push(`RecordingDate :${sep}${this.header?.recordingDate ?? ""}`);
      lines.push(`Channels Recorded ${sep}${this.channels.length}`);
      if (this.channels.length > 0) {
        lines.push(
          `PerChannelSamplingFreq :${sep}${formatSignificant(this.channels[0].perChannelSampleRate)}`,
        );
      }
      if (this.options.downsample) {
        lines.push(`DownsampleCount :${sep}${this.options.downsampleFactor}`);
      }
      lines.push(sep);
      lines.push(CHANNEL_SUMMARY_COLUMNS.join(sep));
      for (const c of this.channels) {
        lines.push(
          [
            c.name,
            c.dataIndex,
            c.unit,
            c.dataType.name,
            c.rangeMin,
            c.rangeMax,
            formatSignificant(c.dataScale),
            formatSignificant(c.dataOffset),
            formatSignificant(c.sensorScale),
            formatSignificant(c.sensorOffset),
          ].join(sep),
        );
      }
      lines.push(sep);
    }

    const names = this.channels.map((c) => c.name);
    if (this.options.includeSampleIndex) names.unshift("data_line");
    lines.push(names.join(sep));

    return lines.map((line) => line + "\n").join("");
  }

  /**
   * Render the rows of one Data chunk. The first call also renders the
   * header.
   */
  renderChunk(chunk: DataChunk): string {
    const { separator: sep, downsample, downsampleFactor, includeSampleIndex } = this.options;

    if (chunk.samples.length !== this.channels.length) {
      throw new ConsistencyError(
        `Data chunk carries ${chunk.samples.length} channels, table has ${this.channels.length}`,
      );
    }

    const rowCount = chunk.samples.length > 0 ? chunk.samples[0].length : 0;
    chunk.samples.forEach((run, j) => {
      if (run.length !== rowCount) {
        throw new ConsistencyError(
          `Channel ${j} has ${run.length} samples, channel 0 has ${rowCount}`,
        );
      }
    });

    let out = "";
    if (!this.headerWritten) {
      out += this.renderHeader();
      this.headerWritten = true;
    }

    for (let i = 0; i < rowCount; i++) {
      ++this.dataLines;
      if (downsample && (this.dataLines - 1) % downsampleFactor !== 0) {
        continue;
      }
      this.tableDataLines++;

      const fields: string[] = [];
      if (includeSampleIndex) fields.push(String(this.dataLines));
      for (let j = 0; j < this.channels.length; j++) {
        fields.push(formatSignificant(toPhysical(this.channels[j], chunk.samples[j][i])));
      }
      out += fields.join(sep) + "\n";
    }

    return out;
  }
}
