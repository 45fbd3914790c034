/**
 * Recording timestamps.
 *
 * The recorder writes timestamps like "2024-01-01 13.45.07.250". Fields are
 * taken positionally; each is the leading integer of its slice.
 */

import type { Timestamp } from "./types.js";

/** Leading integer of a string, 0 when there is none. */
function leadingInt(text: string): number {
  const value = parseInt(text, 10);
  return Number.isNaN(value) ? 0 : value;
}

function leadingFloat(text: string): number {
  const value = parseFloat(text);
  return Number.isNaN(value) ? 0 : value;
}

export function zeroTimestamp(text = ""): Timestamp {
  return {
    text,
    year: 0,
    month: 0,
    day: 0,
    hour: 0,
    minute: 0,
    second: 0,
    subSecond: 0,
    fractionalSeconds: 0,
  };
}

export function parseTimestamp(text: string): Timestamp {
  if (text.length === 0 || leadingInt(text) === 0) {
    return zeroTimestamp(text);
  }

  return {
    text,
    year: leadingInt(text.slice(0, 4)),
    month: leadingInt(text.slice(5, 7)),
    day: leadingInt(text.slice(8, 10)),
    hour: leadingInt(text.slice(11, 13)),
    minute: leadingInt(text.slice(14, 16)),
    second: leadingInt(text.slice(17, 19)),
    subSecond: leadingInt(text.slice(20)),
    fractionalSeconds: leadingFloat(text.slice(17)),
  };
}

export function isZeroTimestamp(ts: Timestamp): boolean {
  return (
    ts.year === 0 &&
    ts.month === 0 &&
    ts.day === 0 &&
    ts.hour === 0 &&
    ts.minute === 0 &&
    ts.second === 0 &&
    ts.subSecond === 0
  );
}

/**
 * Render as `YYYY-MM-DD|hh.mm.ss.x`.
 */
export function formatTimestamp(ts: Timestamp): string {
  const pad = (n: number, width: number) => String(n).padStart(width, "0");
  return (
    `${pad(ts.year, 4)}-${pad(ts.month, 2)}-${pad(ts.day, 2)}` +
    `|${pad(ts.hour, 2)}.${pad(ts.minute, 2)}.${pad(ts.second, 2)}.${ts.subSecond}`
  );
}
