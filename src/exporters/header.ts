/**
 * @fileoverview Header bindings
 *
 * A header binding names one output column and knows how to pull that
 * column's display string out of a record.
 */

/**
 * Pulls one column's display string out of a record
 */
export type Extractor<T> = (record: T) => string;

/**
 * Column label paired with its extraction function.
 *
 * Labels are not checked for uniqueness or emptiness: two bindings with the
 * same label produce two columns, each extracted independently.
 */
export class Header<T> {
  constructor(
    readonly label: string,
    readonly extract: Extractor<T>,
  ) {
    Object.freeze(this);
  }
}

/**
 * Renders a raw field value as a cell. Absent values (`undefined` and
 * `null`) become the empty string; everything else uses `String()`.
 */
export function renderCell(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  return String(value);
}
