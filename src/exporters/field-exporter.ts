/**
 * @fileoverview Field-keyed exporter
 *
 * Exports dictionary-shaped records. Column bindings are derived from a list
 * of field names, which double as the header labels.
 */

import { Header, renderCell } from "./header";
import { RecordExporter, type RecordExporterOptions } from "./record-exporter";

/**
 * A record keyed by field name
 */
export type FieldRecord = Readonly<Record<string, unknown>>;

export type FieldExporterOptions = Omit<
  RecordExporterOptions<FieldRecord>,
  "headers"
>;

/**
 * Binding for one field: missing keys and `null`/`undefined` values render
 * as empty cells
 */
export function fieldHeader(field: string): Header<FieldRecord> {
  return new Header<FieldRecord>(field, (record) =>
    Object.prototype.hasOwnProperty.call(record, field)
      ? renderCell(record[field])
      : "",
  );
}

export class FieldExporter extends RecordExporter<FieldRecord> {
  private readonly fields: readonly string[];
  private readonly records: readonly FieldRecord[];

  constructor(
    fields: readonly string[],
    records: readonly FieldRecord[],
    options: FieldExporterOptions = {},
  ) {
    super(options);
    this.fields = Object.freeze([...fields]);
    this.records = Object.freeze([...records]);
  }

  fetchRecords(): readonly FieldRecord[] {
    return this.records;
  }

  /**
   * One binding per field name, in the order given. Repeated names give
   * repeated columns.
   */
  override getHeaders(): readonly Header<FieldRecord>[] {
    return this.fields.map(fieldHeader);
  }
}
