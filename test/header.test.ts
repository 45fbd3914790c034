import { describe, it, expect } from "vitest";
import { decodeHeader } from "../src/core/header.js";
import { SchemaError, StructuralError } from "../src/errors.js";
import { chunk, headerChunk, KIND } from "./helpers/hpf-builder.js";

describe("decodeHeader", () => {
  it("should decode the fixed fields and recording date", () => {
    const header = decodeHeader(
      headerChunk({
        creator: "datx",
        fileVersion: 0x10002,
        indexOffset: 4096,
        recordingDate: "2024-03-15 12.34.56.789",
      }),
    );

    expect(header.creatorId).toBe("datx");
    expect(header.fileVersion).toBe(0x10002);
    expect(header.indexChunkOffset).toBe(4096);
    expect(header.recordingDate).toBe("2024-03-15 12.34.56.789");
    expect(header.recordingTime.year).toBe(2024);
    expect(header.recordingTime.minute).toBe(34);
    expect(header.recordingTime.subSecond).toBe(789);
  });

  it("should accept an empty recording date", () => {
    const header = decodeHeader(headerChunk({ xml: "<RecordingDate></RecordingDate>" }));
    expect(header.recordingDate).toBe("");
    expect(header.recordingTime.year).toBe(0);
  });

  it("should reject a document with the wrong root", () => {
    expect(() => decodeHeader(headerChunk({ xml: "<Other>x</Other>" }))).toThrow(
      "<RecordingDate> not found in doc, instead found <Other>",
    );
  });

  it("should reject an empty document", () => {
    expect(() => decodeHeader(headerChunk({ xml: "" }))).toThrow(SchemaError);
  });

  it("should reject malformed XML", () => {
    expect(() =>
      decodeHeader(headerChunk({ xml: "<RecordingDate>x</Other>" })),
    ).toThrow(SchemaError);
  });

  it("should reject a chunk too short for its fields", () => {
    expect(() => decodeHeader(chunk(KIND.header, new Uint8Array(8)))).toThrow(StructuralError);
  });
});
