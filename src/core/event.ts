/**
 * Event chunks.
 *
 * Definitions are decoded and validated; event records are only counted.
 * Neither reaches the output table.
 */

import { SchemaError, StructuralError } from "../errors.js";
import { requireRoot } from "../xml/document.js";
import { BinaryCursor } from "./cursor.js";
import { CHUNK_PREFIX_SIZE } from "./decode.js";
import {
  applyFields,
  parseBoolField,
  parseIntField,
  type FieldTable,
} from "./fields.js";
import type { EventDefinition, EventType } from "./types.js";

const EVENT_DEFINITION_ROOT = "EventDefinitionData";

/** The only event class the recorder writes. */
const DATA_TRANSLATION_EVENT_CLASS = 0x0001;

function parseEventType(text: string): EventType {
  switch (text.trim().toLowerCase()) {
    case "point":
      return "Point";
    case "ranged":
      return "Ranged";
    default:
      throw new SchemaError(`Event type unknown: "${text}"`, { value: text });
  }
}

type KeysAccepting<T, V> = {
  [K in keyof T]: V extends T[K] ? K : never;
}[keyof T];

const text =
  (key: KeysAccepting<EventDefinition, string>) =>
  (d: EventDefinition, t: string) => {
    d[key] = t;
  };

const flag =
  (key: KeysAccepting<EventDefinition, boolean>) =>
  (d: EventDefinition, t: string) => {
    d[key] = parseBoolField(t, key);
  };

const EVENT_DEFINITION_FIELDS: FieldTable<EventDefinition> = {
  Name: text("name"),
  Description: text("description"),
  Class: (d, t) => {
    const eventClass = parseIntField(t);
    if (eventClass !== DATA_TRANSLATION_EVENT_CLASS) {
      throw new SchemaError(`Unknown event class ${t}`, { value: t });
    }
    d.eventClass = eventClass;
  },
  ID: (d, t) => {
    const id = parseIntField(t);
    if (id === 0) {
      throw new SchemaError(`Event id is 0`, { value: t });
    }
    d.id = id;
  },
  Type: (d, t) => {
    d.type = parseEventType(t);
  },
  UsesIData1: flag("usesIData1"),
  UsesIData2: flag("usesIData2"),
  UsesDData1: flag("usesDData1"),
  UsesDData2: flag("usesDData2"),
  UsesDData3: flag("usesDData3"),
  UsesDData4: flag("usesDData4"),
  DescriptionIData1: text("descriptionIData1"),
  DescriptionIData2: text("descriptionIData2"),
  DescriptionDData1: text("descriptionDData1"),
  DescriptionDData2: text("descriptionDData2"),
  DescriptionDData3: text("descriptionDData3"),
  DescriptionDData4: text("descriptionDData4"),
  Parameter1: text("parameter1"),
  Parameter2: text("parameter2"),
  Tolerance: text("tolerance"),
  UsesParameter1: flag("usesParameter1"),
  UsesParameter2: flag("usesParameter2"),
  UsesTolerance: flag("usesTolerance"),
  DescriptionParameter1: text("descriptionParameter1"),
  DescriptionParameter2: text("descriptionParameter2"),
  DescriptionTolerance: text("descriptionTolerance"),
};

function newEventDefinition(index: number): EventDefinition {
  return {
    index,
    name: "",
    description: "",
    eventClass: DATA_TRANSLATION_EVENT_CLASS,
    id: 0,
    type: "Point",
    usesIData1: false,
    usesIData2: false,
    usesDData1: false,
    usesDData2: false,
    usesDData3: false,
    usesDData4: false,
    descriptionIData1: "",
    descriptionIData2: "",
    descriptionDData1: "",
    descriptionDData2: "",
    descriptionDData3: "",
    descriptionDData4: "",
    parameter1: "",
    parameter2: "",
    tolerance: "",
    usesParameter1: false,
    usesParameter2: false,
    usesTolerance: false,
    descriptionParameter1: "",
    descriptionParameter2: "",
    descriptionTolerance: "",
  };
}

/**
 * Decode an EventDefinition chunk.
 *
 * Layout after the prefix: int32 definition count, then NUL-terminated XML.
 */
export function decodeEventDefinitions(payload: Uint8Array): EventDefinition[] {
  const cursor = new BinaryCursor(payload, CHUNK_PREFIX_SIZE);
  const definitionCount = cursor.readInt32();
  const xml = cursor.readCString();

  const root = requireRoot(xml, EVENT_DEFINITION_ROOT);
  const definitions = root.children().map((element, index) => {
    const definition = newEventDefinition(index);
    applyFields(element, EVENT_DEFINITION_FIELDS, definition, element.name);
    return definition;
  });

  if (definitions.length !== definitionCount) {
    throw new SchemaError(
      `Observed ${definitions.length} event definitions, expected ${definitionCount}`,
      { value: definitionCount },
    );
  }
  return definitions;
}

/**
 * Read the event count of an EventData chunk. The records are not decoded.
 */
export function decodeEventCount(payload: Uint8Array): number {
  const cursor = new BinaryCursor(payload, CHUNK_PREFIX_SIZE);
  const eventCount = cursor.readInt64();
  if (eventCount < 0) {
    throw new StructuralError(`Negative event count ${eventCount}`, { value: eventCount });
  }
  return eventCount;
}
