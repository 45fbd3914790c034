import { describe, it, expect } from "vitest";
import {
  ChunkKind,
  chunkKindName,
  parseChunkPrefix,
} from "../src/core/decode.js";
import { BinaryCursor } from "../src/core/cursor.js";
import { StructuralError } from "../src/errors.js";
import { chunk, KIND } from "./helpers/hpf-builder.js";

describe("Chunk framing", () => {
  describe("parseChunkPrefix", () => {
    it("should read kind and length", () => {
      const bytes = chunk(KIND.data, new Uint8Array(48));
      expect(parseChunkPrefix(bytes, 0, 1024)).toEqual({
        kind: ChunkKind.Data,
        length: 64,
      });
    });

    it("should reject unknown kinds", () => {
      const bytes = chunk(0x7000, new Uint8Array(0));
      expect(() => parseChunkPrefix(bytes, 0, 1024)).toThrow(StructuralError);
      expect(() => parseChunkPrefix(bytes, 0, 1024)).toThrow("Unknown chunk kind 0x7000");
    });

    it("should reject chunks larger than the buffer", () => {
      const bytes = chunk(KIND.data, new Uint8Array(0), 2048);
      expect(() => parseChunkPrefix(bytes, 32, 1024)).toThrow(
        "Buffer size 0x400 is too small for chunk size 0x800 [chunk=data offset=0x20]",
      );
    });

    it("should reject lengths shorter than the prefix", () => {
      const bytes = chunk(KIND.index, new Uint8Array(0), 8);
      expect(() => parseChunkPrefix(bytes, 0, 1024)).toThrow(StructuralError);
    });

    it("should reject short input", () => {
      expect(() => parseChunkPrefix(new Uint8Array(10), 0, 1024)).toThrow(StructuralError);
    });
  });

  describe("chunkKindName", () => {
    it("should name known and unknown kinds", () => {
      expect(chunkKindName(ChunkKind.ChannelInfo)).toBe("channelinfo");
      expect(chunkKindName(ChunkKind.EventDefinition)).toBe("eventdefinition");
      expect(chunkKindName(0x7000)).toBe("unknown_0x7000");
    });
  });
});

describe("BinaryCursor", () => {
  const bytes = new Uint8Array(24);
  const view = new DataView(bytes.buffer);
  view.setInt32(0, -5, true);
  view.setBigInt64(4, 1234567890123n, true);
  bytes.set(new TextEncoder().encode("datx"), 12);
  bytes.set(new TextEncoder().encode("abc"), 16);

  it("should read typed fields in sequence", () => {
    const cursor = new BinaryCursor(bytes);
    expect(cursor.readInt32()).toBe(-5);
    expect(cursor.readInt64()).toBe(1234567890123);
    expect(cursor.readFourCC()).toBe("datx");
    expect(cursor.position).toBe(16);
  });

  it("should stop C strings at the first NUL", () => {
    const cursor = new BinaryCursor(bytes, 16);
    expect(cursor.readCString()).toBe("abc");
    expect(cursor.position).toBe(20);
  });

  it("should accept an unterminated string at the end", () => {
    const tail = new TextEncoder().encode("xyz");
    const cursor = new BinaryCursor(tail);
    expect(cursor.readCString()).toBe("xyz");
    expect(cursor.remaining).toBe(0);
  });

  it("should throw on reads past the end", () => {
    const cursor = new BinaryCursor(bytes, 20);
    expect(() => cursor.readInt64()).toThrow(StructuralError);
  });

  it("should reject 64-bit values beyond the safe integer range", () => {
    const big = new Uint8Array(8);
    new DataView(big.buffer).setBigInt64(0, 2n ** 60n, true);
    expect(() => new BinaryCursor(big).readInt64()).toThrow(StructuralError);
  });
});
