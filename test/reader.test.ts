import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MemoryByteSource } from "../src/backend/memory.js";
import { ChunkKind } from "../src/core/decode.js";
import { ConsistencyError, HpfError } from "../src/errors.js";
import { Logger } from "../src/log.js";
import type { TableSink } from "../src/output/table.js";
import { HpfReader, type HpfReaderOptions } from "../src/reader.js";
import {
  channelInfoChunk,
  concat,
  dataChunk,
  eventDataChunk,
  eventDefinitionChunk,
  headerChunk,
  indexChunk,
  KIND,
} from "./helpers/hpf-builder.js";

const plain: HpfReaderOptions = { preamble: false, downsample: false };

const header = headerChunk();
const channelInfo = channelInfoChunk(1, [{ name: "A" }, { name: "B", scale: 2, offset: 1 }]);
const firstData = dataChunk(1, 0, [[10, 20], [5, 6]]);

function collect(): TableSink & { text: string } {
  return {
    text: "",
    write(text: string) {
      this.text += text;
    },
  };
}

function reader(bytes: Uint8Array, options: HpfReaderOptions = plain): HpfReader {
  return new HpfReader(new MemoryByteSource(bytes), options);
}

function conversionError(r: HpfReader, sink: TableSink): HpfError {
  try {
    r.convert(sink);
  } catch (err) {
    if (err instanceof HpfError) return err;
    throw err;
  }
  throw new Error("conversion succeeded");
}

describe("HpfReader", () => {
  it("should convert a recording into a table", () => {
    const sink = collect();
    const r = reader(concat(header, channelInfo, firstData));
    const summary = r.convert(sink);

    expect(sink.text).toBe("A\tB\n10\t11\n20\t13\n");
    expect(summary).toEqual({
      chunks: 3,
      dataChunks: 1,
      samples: 2,
      rows: 2,
      indexEntries: 0,
      eventDefinitions: 0,
      events: 0,
    });
    expect(r.getHeader()?.creatorId).toBe("datx");
    expect(r.getGroupId()).toBe(1);
    expect(r.listChannels().map((c) => c.name)).toEqual(["A", "B"]);
  });

  it("should step through chunks one at a time", () => {
    const sink = collect();
    const r = reader(concat(header, channelInfo, firstData));
    expect(r.readChunk(sink)).toBe(ChunkKind.Header);
    expect(r.readChunk(sink)).toBe(ChunkKind.ChannelInfo);
    expect(sink.text).toBe("");
    expect(r.readChunk(sink)).toBe(ChunkKind.Data);
    expect(r.readChunk(sink)).toBeNull();
  });

  it("should write the preamble and downsample by default", () => {
    const sink = collect();
    reader(concat(header, channelInfo, firstData), {}).convert(sink);
    const lines = sink.text.split("\n");
    expect(lines[0]).toBe("RecordingDate :\t2024-01-01 00.00.00.000");
    expect(lines[3]).toBe("DownsampleCount :\t1000");
    expect(lines.slice(-3)).toEqual(["A\tB", "10\t11", ""]);
  });

  it("should produce nothing for a recording without data", () => {
    const sink = collect();
    const summary = reader(concat(header, channelInfo)).convert(sink);
    expect(sink.text).toBe("");
    expect(summary.rows).toBe(0);
  });

  it("should decode without writing when the table is disabled", () => {
    const sink = collect();
    const summary = reader(concat(header, channelInfo, firstData), { table: false }).convert(sink);
    expect(sink.text).toBe("");
    expect(summary.dataChunks).toBe(1);
    expect(summary.samples).toBe(2);
    expect(summary.rows).toBe(0);
  });

  it("should reject a second ChannelInfo chunk before any output", () => {
    const sink = collect();
    const r = reader(concat(header, channelInfo, channelInfo, firstData));
    const err = conversionError(r, sink);

    expect(err).toBeInstanceOf(ConsistencyError);
    expect(err.message).toBe(
      `channelinfo already defined with 2 channels [chunk=channelinfo offset=0x${(header.length + channelInfo.length).toString(16)}]`,
    );
    expect(sink.text).toBe("");
    expect(r.summary().dataChunks).toBe(0);
  });

  it("should keep rows already written when a later chunk is inconsistent", () => {
    const sink = collect();
    const stray = dataChunk(2, 2, [[30], [7]]);
    const r = reader(concat(header, channelInfo, firstData, stray));
    const err = conversionError(r, sink);

    expect(err).toBeInstanceOf(ConsistencyError);
    expect(err.context.chunkKind).toBe("data");
    expect(err.context.fileOffset).toBe(header.length + channelInfo.length + firstData.length);
    expect(err.context.value).toBe(2);
    expect(sink.text).toBe("A\tB\n10\t11\n20\t13\n");
  });

  it("should reject data before channel information", () => {
    const err = conversionError(reader(concat(header, firstData)), collect());
    expect(err.message).toBe(`Data chunk before channelinfo [chunk=data offset=0x${header.length.toString(16)}]`);
  });

  it("should keep the first header and ignore later ones", () => {
    const later = headerChunk({ creator: "abcd", recordingDate: "2030-06-07 08.09.10.000" });
    const lines: string[] = [];
    const logger = new Logger(1, (line) => lines.push(line));
    const sink = collect();
    const r = reader(concat(header, channelInfo, later, firstData), { ...plain, logger });
    const summary = r.convert(sink);

    expect(summary.chunks).toBe(4);
    expect(r.getHeader()?.creatorId).toBe("datx");
    expect(r.getHeader()?.recordingDate).toBe("2024-01-01 00.00.00.000");
    expect(sink.text).toBe("A\tB\n10\t11\n20\t13\n");
    expect(lines).toContain(
      `[HpfReader.onHeader] ignoring header chunk at 0x${(header.length + channelInfo.length).toString(16)}, keeping the first`,
    );
  });

  it("should count events and collect the index", () => {
    const definitions =
      "<EventDefinitionData><EventDefinition><Name>Mark</Name><ID>3</ID></EventDefinition></EventDefinitionData>";
    const dataOffset = header.length + channelInfo.length;
    const bytes = concat(
      header,
      channelInfo,
      firstData,
      eventDefinitionChunk(1, definitions),
      eventDataChunk(3),
      eventDataChunk(2),
      indexChunk([[0, 2, KIND.data, 1, dataOffset]]),
    );
    const sink = collect();
    const r = reader(bytes);
    const summary = r.convert(sink);

    expect(sink.text).toBe("A\tB\n10\t11\n20\t13\n");
    expect(summary.chunks).toBe(7);
    expect(summary.eventDefinitions).toBe(1);
    expect(summary.events).toBe(5);
    expect(summary.indexEntries).toBe(1);
    expect(r.getIndex()[0].fileOffset).toBe(dataOffset);
  });

  it("should reject a second index chunk", () => {
    const index = indexChunk([]);
    const err = conversionError(reader(concat(header, index, index)), collect());
    expect(err.message).toContain("index chunk already seen");
  });

  it("should stop at a truncated trailing chunk", () => {
    const sink = collect();
    const bytes = concat(header, channelInfo, firstData, firstData.subarray(0, 20));
    const summary = reader(bytes).convert(sink);
    expect(summary.chunks).toBe(3);
    expect(sink.text).toBe("A\tB\n10\t11\n20\t13\n");
  });

  it("should validate options", () => {
    expect(() => reader(new Uint8Array(0), { downsampleFactor: 0 })).toThrow(RangeError);
    expect(() => reader(new Uint8Array(0), { maxChunkSize: 8 })).toThrow(RangeError);
  });

  it("should trace chunks through the logger", () => {
    const lines: string[] = [];
    const logger = new Logger(1, (line) => lines.push(line));
    reader(concat(header, channelInfo), { logger }).convert(collect());

    expect(lines).toEqual([
      `[ChunkReader.next] offset=0x0 kind=header length=0x${header.length.toString(16)}`,
      `[ChunkReader.next] offset=0x${header.length.toString(16)} kind=channelinfo length=0x${channelInfo.length.toString(16)}`,
      `[ChunkReader.next] could only read 0 bytes at 0x${(header.length + channelInfo.length).toString(16)}, end of stream`,
    ]);
  });

  describe("open", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "hpf-table-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should convert a recording from disk", () => {
      const path = join(dir, "run.hpf");
      writeFileSync(path, concat(header, channelInfo, firstData));

      const sink = collect();
      const r = HpfReader.open(path, plain);
      try {
        r.convert(sink);
      } finally {
        r.close();
      }
      expect(sink.text).toBe("A\tB\n10\t11\n20\t13\n");
    });
  });
});
