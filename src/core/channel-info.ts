/**
 * ChannelInfo chunk decoding.
 *
 * Layout after the 16-byte prefix:
 * - int32 group id
 * - int32 number of channels
 * - NUL-terminated XML: <ChannelInformationData> with one child per channel
 *
 * Channels take their column index from document order, not from any
 * declared index.
 */

import { SchemaError } from "../errors.js";
import { requireRoot } from "../xml/document.js";
import { BinaryCursor } from "./cursor.js";
import { findSampleType } from "./datatype.js";
import { CHUNK_PREFIX_SIZE } from "./decode.js";
import {
  applyFields,
  parseBoolField,
  parseDoubleField,
  parseIntField,
  type FieldTable,
} from "./fields.js";
import { parseTimestamp, zeroTimestamp } from "./time.js";
import type { ChannelInfo, ChannelMetadata } from "./types.js";

const CHANNEL_INFO_ROOT = "ChannelInformationData";

/** A channel while its fields are being filled in. */
type ChannelDraft = Omit<ChannelMetadata, "dataType"> & {
  dataType?: ChannelMetadata["dataType"];
};

const CHANNEL_FIELDS: FieldTable<ChannelDraft> = {
  Name: (c, t) => {
    c.name = t;
  },
  Unit: (c, t) => {
    c.unit = t;
  },
  ChannelType: (c, t) => {
    c.channelType = t;
  },
  AssignedTimeChannelIndex: (c, t) => {
    c.assignedTimeChannelIndex = parseIntField(t);
  },
  DataType: (c, t) => {
    const type = findSampleType(t);
    if (!type) {
      throw new SchemaError(`DataType unknown: "${t}"`, { value: t });
    }
    c.dataType = type;
  },
  DataIndex: (c, t) => {
    c.dataIndex = parseIntField(t);
  },
  StartTime: (c, t) => {
    c.startTime = parseTimestamp(t);
  },
  TimeIncrement: (c, t) => {
    c.timeIncrement = parseDoubleField(t);
  },
  RangeMin: (c, t) => {
    c.rangeMin = parseIntField(t);
  },
  RangeMax: (c, t) => {
    c.rangeMax = parseIntField(t);
  },
  DataScale: (c, t) => {
    c.dataScale = parseDoubleField(t);
  },
  DataOffset: (c, t) => {
    c.dataOffset = parseDoubleField(t);
  },
  SensorScale: (c, t) => {
    c.sensorScale = parseDoubleField(t);
  },
  SensorOffset: (c, t) => {
    c.sensorOffset = parseDoubleField(t);
  },
  PerChannelSampleRate: (c, t) => {
    c.perChannelSampleRate = parseDoubleField(t);
  },
  PhysicalChannelNumber: (c, t) => {
    c.physicalChannelNumber = parseIntField(t);
  },
  UsesSensorValues: (c, t) => {
    c.usesSensorValues = parseBoolField(t, "UsesSensorValues");
  },
  ThermocoupleType: (c, t) => {
    c.thermocoupleType = t;
  },
  TemperatureUnit: (c, t) => {
    c.temperatureUnit = t;
  },
  UseThermocoupleValues: (c, t) => {
    c.useThermocoupleValues = parseBoolField(t, "UseThermocoupleValues");
  },
};

function newChannel(index: number): ChannelDraft {
  return {
    index,
    name: "",
    unit: "",
    channelType: "",
    assignedTimeChannelIndex: 0,
    dataIndex: 0,
    startTime: zeroTimestamp(),
    timeIncrement: 0,
    rangeMin: 0,
    rangeMax: 0,
    dataScale: 1,
    dataOffset: 0,
    sensorScale: 0,
    sensorOffset: 0,
    perChannelSampleRate: 0,
    physicalChannelNumber: 0,
    usesSensorValues: false,
  };
}

export function decodeChannelInfo(payload: Uint8Array): ChannelInfo {
  const cursor = new BinaryCursor(payload, CHUNK_PREFIX_SIZE);
  const groupId = cursor.readInt32();
  const channelCount = cursor.readInt32();
  const xml = cursor.readCString();

  const root = requireRoot(xml, CHANNEL_INFO_ROOT);
  const elements = root.children();
  if (elements.length !== channelCount) {
    throw new SchemaError(
      `ChannelInfo declares ${channelCount} channels but the document describes ${elements.length}`,
      { value: channelCount },
    );
  }

  const channels = elements.map((element, index): ChannelMetadata => {
    const draft = newChannel(index);
    applyFields(element, CHANNEL_FIELDS, draft, element.name);
    const { dataType } = draft;
    if (!dataType) {
      throw new SchemaError(`Channel ${index} (${draft.name}) has no DataType`);
    }
    return { ...draft, dataType };
  });

  return { groupId, channels };
}
