/**
 * Error types for structured error handling in the tabular export system
 */

/**
 * Base error class for all export errors
 * Provides common properties for error tracking and debugging
 */
export abstract class TabularExportError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Returns a structured representation of the error for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when an exporter is invoked without the pieces it needs to produce
 * an export: no record source, or no header bindings declared at all
 */
export class ExporterMisuseError extends TabularExportError {
  public readonly exporterName: string;
  public readonly missing: "fetchRecords" | "headers";

  constructor(
    message: string,
    exporterName: string,
    missing: "fetchRecords" | "headers",
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, exporterName, missing });
    this.exporterName = exporterName;
    this.missing = missing;
  }
}

/**
 * Thrown when a row is taken from a cursor that has no rows left
 */
export class ExportExhaustedError extends TabularExportError {
  public readonly rowsTaken: number;

  constructor(rowsTaken: number) {
    super(`Export cursor exhausted after ${rowsTaken} rows`, { rowsTaken });
    this.rowsTaken = rowsTaken;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends TabularExportError {
  public readonly configKey: string;

  constructor(
    message: string,
    configKey: string,
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, configKey });
    this.configKey = configKey;
  }
}

/**
 * Error thrown when writing an export to its destination fails
 */
export class DeliveryError extends TabularExportError {
  public readonly correlationId: string;
  public readonly rowsWritten: number;
  public readonly originalError: unknown;

  constructor(
    message: string,
    correlationId: string,
    rowsWritten: number,
    originalError: unknown,
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, correlationId, rowsWritten });
    this.correlationId = correlationId;
    this.rowsWritten = rowsWritten;
    this.originalError = originalError;
  }
}

/**
 * Utility function to generate correlation IDs for delivery tracking
 */
export function generateCorrelationId(): string {
  return `export-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
