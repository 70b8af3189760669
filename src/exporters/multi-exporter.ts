/**
 * @fileoverview Composite exporter
 *
 * Concatenates several exports into one, with a single empty row between
 * consecutive exports.
 */

import { BaseExporter, type ExporterOptions, type Row, type TabularExporter } from "./base-exporter";

const SEPARATOR: Row = Object.freeze([]);

export class MultiExporter extends BaseExporter {
  private readonly exporters: readonly TabularExporter[];

  /**
   * @param exporters - Sub-exporters, in output order
   * @param options - Delivery hints only; each sub-exporter keeps its own
   * header order
   */
  constructor(
    exporters: readonly TabularExporter[],
    options: Omit<ExporterOptions, "headerOrder"> = {},
  ) {
    super(options);
    this.exporters = Object.freeze([...exporters]);
  }

  /**
   * Separators are placed by list position, so the same exporter listed
   * twice still gets one between its two exports. Each sub-export starts
   * only once the previous one is exhausted.
   */
  protected *generateRows(): Generator<Row, void, undefined> {
    for (const [index, exporter] of this.exporters.entries()) {
      if (index > 0) {
        yield SEPARATOR;
      }
      yield* exporter.iterRows();
    }
  }
}
