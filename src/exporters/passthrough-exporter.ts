/**
 * @fileoverview Passthrough exporter
 *
 * Re-emits a table that is already rows of strings: the first row is taken as
 * the header labels, the rest as data. Rows are not reshaped or checked
 * against the header width.
 */

import { BaseExporter, type ExporterOptions, type Row } from "./base-exporter";

export class PassthroughExporter extends BaseExporter {
  private readonly table: readonly Row[];

  /**
   * @param table - Header row followed by data rows
   * @param options - `headerOrder` is accepted but has no effect here
   */
  constructor(table: readonly Row[], options: ExporterOptions = {}) {
    super(options);
    this.table = Object.freeze(table.map((row) => Object.freeze([...row])));
  }

  protected *generateRows(): Generator<Row, void, undefined> {
    yield* this.table;
  }
}
