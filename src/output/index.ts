/**
 * @fileoverview Output Delivery Module
 *
 * Serializes exports to CSV text, HTTP attachments and Excel workbooks.
 */

// CSV Writer
export { CSVWriter, toCSV, csvLines } from "./csv-writer";

// HTTP delivery
export {
  attachmentDisposition,
  sendExport,
  streamExport,
} from "./http-response";

// Workbooks
export { addExportSheet, toSheetName, toWorkbookBuffer } from "./workbook-writer";

// Types
export type { CSVWriterConfig } from "./csv-writer";
export type {
  AttachmentResponse,
  DeliveryOptions,
  DeliveryResult,
} from "./http-response";
