/**
 * @fileoverview Exporters Module
 *
 * The exporter kinds and the contract they share.
 */

export { Header, renderCell } from "./header";
export { BaseExporter, RowCursor } from "./base-exporter";
export { RecordExporter, defineRecordExporter } from "./record-exporter";
export { FieldExporter, fieldHeader } from "./field-exporter";
export { PassthroughExporter } from "./passthrough-exporter";
export { MultiExporter } from "./multi-exporter";

export type { Extractor } from "./header";
export type { Row, ExporterOptions, TabularExporter } from "./base-exporter";
export type {
  RecordExporterOptions,
  RecordExporterDefinition,
} from "./record-exporter";
export type { FieldRecord, FieldExporterOptions } from "./field-exporter";
