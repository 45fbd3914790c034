/**
 * Tag-driven population of metadata records from XML elements.
 *
 * Each record kind has a field table mapping a child tag name to a setter.
 * Tags missing from the table and malformed booleans are schema errors;
 * numeric text is read leniently.
 */

import { SchemaError } from "../errors.js";
import type { XmlElement } from "../xml/document.js";

export type FieldSetter<T> = (target: T, text: string) => void;
export type FieldTable<T> = Readonly<Record<string, FieldSetter<T>>>;

/**
 * Leading integer of the text, 0 when there is none. Out-of-range values
 * are kept as written.
 */
export function parseIntField(text: string): number {
  const value = parseInt(text.trim(), 10);
  return Number.isNaN(value) ? 0 : value;
}

/** Leading decimal number of the text, 0 when there is none. */
export function parseDoubleField(text: string): number {
  const value = parseFloat(text.trim());
  return Number.isNaN(value) ? 0 : value;
}

/** Only the literals "True" and "False" are booleans. */
export function parseBoolField(text: string, field: string): boolean {
  if (text === "True") return true;
  if (text === "False") return false;
  throw new SchemaError(`${field}: expected True or False, got "${text}"`, { value: text });
}

/**
 * Apply every child element of `element` to `target` through `table`.
 */
export function applyFields<T>(
  element: XmlElement,
  table: FieldTable<T>,
  target: T,
  owner: string,
): void {
  for (const child of element.children()) {
    if (!Object.prototype.hasOwnProperty.call(table, child.name)) {
      throw new SchemaError(`Unknown child of ${owner}: <${child.name}>`, {
        value: child.name,
      });
    }
    table[child.name](target, child.text());
  }
}
