/**
 * @fileoverview HTTP attachment delivery
 *
 * Sends an export as a downloadable CSV attachment, either buffered (the
 * whole document written once) or streamed (one write per row, pulled from
 * the lazy form as the response drains).
 */

import type { TabularExporter } from "../exporters/base-exporter";
import { DeliveryError, generateCorrelationId } from "../types/errors";
import { createCorrelatedLogger } from "../utils/logger";
import { CSVWriter, type CSVWriterConfig } from "./csv-writer";

/**
 * The part of `http.ServerResponse` delivery needs
 */
export interface AttachmentResponse {
  setHeader(name: string, value: string): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  once(event: ResponseEvent, listener: (error?: Error) => void): unknown;
  removeListener(
    event: ResponseEvent,
    listener: (error?: Error) => void,
  ): unknown;
  destroy(error?: Error): unknown;
}

type ResponseEvent = "drain" | "close" | "error";

export interface DeliveryOptions {
  /** Overrides the exporter's filename hint */
  filename?: string;
  /** Extension appended to the filename (default: 'csv') */
  extension?: string;
  /** Correlation ID for log entries; generated when absent */
  correlationId?: string;
  csv?: CSVWriterConfig;
}

export interface DeliveryResult {
  correlationId: string;
  mode: "buffered" | "streamed";
  rowsWritten: number;
  bytesWritten: number;
}

/**
 * Content-Disposition value for a downloadable file
 */
export function attachmentDisposition(
  filename: string,
  extension: string = "csv",
): string {
  return `attachment; filename="${filename}.${extension}"`;
}

/**
 * Resolves on `drain`; rejects with a DeliveryError if the response closes
 * or errors first
 */
function waitForDrain(
  response: AttachmentResponse,
  correlationId: string,
  rowsWritten: number,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      response.removeListener("drain", onDrain);
      response.removeListener("close", onClose);
      response.removeListener("error", onError);
    };
    const onDrain = (): void => {
      cleanup();
      resolve();
    };
    const onClose = (): void => {
      cleanup();
      reject(
        new DeliveryError(
          "Response closed before the export was delivered",
          correlationId,
          rowsWritten,
          undefined,
        ),
      );
    };
    const onError = (error?: Error): void => {
      cleanup();
      reject(
        new DeliveryError(
          `Failed to write export: ${error?.message ?? "response error"}`,
          correlationId,
          rowsWritten,
          error,
        ),
      );
    };

    response.once("drain", onDrain);
    response.once("close", onClose);
    response.once("error", onError);
  });
}

function setAttachmentHeaders(
  exporter: TabularExporter,
  response: AttachmentResponse,
  options: DeliveryOptions,
): void {
  response.setHeader("Content-Type", exporter.getContentType());
  response.setHeader(
    "Content-Disposition",
    attachmentDisposition(
      options.filename ?? exporter.getFilename(),
      options.extension,
    ),
  );
}

/**
 * Buffered delivery: produces the whole export before anything is written
 */
export async function sendExport(
  exporter: TabularExporter,
  response: AttachmentResponse,
  options: DeliveryOptions = {},
): Promise<DeliveryResult> {
  const correlationId = options.correlationId ?? generateCorrelationId();
  const log = createCorrelatedLogger(correlationId, {
    exporter: exporter.constructor.name,
    operation: "send_export",
  });
  const writer = new CSVWriter(options.csv);

  const rows = exporter.toList();
  const body = rows.map((row) => writer.formatRow(row)).join("");

  try {
    setAttachmentHeaders(exporter, response, options);
    response.write(body);
    response.end();
  } catch (error) {
    log.error("Export delivery failed", error as Error);
    response.destroy(error as Error);
    throw new DeliveryError(
      `Failed to write export: ${(error as Error).message}`,
      correlationId,
      0,
      error,
    );
  }

  const result: DeliveryResult = {
    correlationId,
    mode: "buffered",
    rowsWritten: rows.length,
    bytesWritten: Buffer.byteLength(body, "utf8"),
  };
  log.info("Export delivered", { ...result });
  return result;
}

/**
 * Streamed delivery: each row is computed only when the previous one has
 * been handed to the response, and writing pauses while the response is
 * applying backpressure.
 *
 * A failure while producing rows destroys the response and is rethrown
 * unchanged; the client sees a truncated body. A failed write, or the
 * response closing or erroring while paused, destroys the response and
 * rejects with a DeliveryError.
 */
export async function streamExport(
  exporter: TabularExporter,
  response: AttachmentResponse,
  options: DeliveryOptions = {},
): Promise<DeliveryResult> {
  const correlationId = options.correlationId ?? generateCorrelationId();
  const log = createCorrelatedLogger(correlationId, {
    exporter: exporter.constructor.name,
    operation: "stream_export",
  });
  const writer = new CSVWriter(options.csv);

  const cursor = exporter.iterRows();
  let bytesWritten = 0;

  setAttachmentHeaders(exporter, response, options);
  log.debug("Streaming export");

  for (;;) {
    let line: string;
    try {
      if (!cursor.hasNext()) {
        break;
      }
      line = writer.formatRow(cursor.take());
    } catch (error) {
      log.error("Export production failed mid-stream", error as Error, {
        rowsWritten: cursor.rowsTaken,
      });
      response.destroy(error as Error);
      throw error;
    }

    let flushed: boolean;
    try {
      flushed = response.write(line);
    } catch (error) {
      log.error("Export delivery failed", error as Error, {
        rowsWritten: cursor.rowsTaken - 1,
      });
      response.destroy(error as Error);
      throw new DeliveryError(
        `Failed to write export: ${(error as Error).message}`,
        correlationId,
        cursor.rowsTaken - 1,
        error,
      );
    }
    bytesWritten += Buffer.byteLength(line, "utf8");

    if (!flushed) {
      try {
        await waitForDrain(response, correlationId, cursor.rowsTaken);
      } catch (error) {
        log.error("Response ended while streaming export", error as Error, {
          rowsWritten: cursor.rowsTaken,
        });
        response.destroy();
        throw error;
      }
    }
  }

  response.end();

  const result: DeliveryResult = {
    correlationId,
    mode: "streamed",
    rowsWritten: cursor.rowsTaken,
    bytesWritten,
  };
  log.info("Export delivered", { ...result });
  return result;
}
