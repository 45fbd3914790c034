/**
 * Sample datatypes a channel may declare.
 */

export type SampleTypeName = "Int16" | "UInt16" | "Int32" | "Float" | "Double";

export interface SampleType {
  name: SampleTypeName;
  /** Atom size in bytes */
  size: number;
  read(view: DataView, offset: number): number;
}

const SAMPLE_TYPES: Record<string, SampleType> = {
  int16: {
    name: "Int16",
    size: 2,
    read: (view, offset) => view.getInt16(offset, true),
  },
  uint16: {
    name: "UInt16",
    size: 2,
    read: (view, offset) => view.getUint16(offset, true),
  },
  int32: {
    name: "Int32",
    size: 4,
    read: (view, offset) => view.getInt32(offset, true),
  },
  float: {
    name: "Float",
    size: 4,
    read: (view, offset) => view.getFloat32(offset, true),
  },
  double: {
    name: "Double",
    size: 8,
    read: (view, offset) => view.getFloat64(offset, true),
  },
};

/**
 * Look up a datatype by its declared name, case-insensitively.
 */
export function findSampleType(declared: string): SampleType | undefined {
  const key = declared.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(SAMPLE_TYPES, key)
    ? SAMPLE_TYPES[key]
    : undefined;
}
