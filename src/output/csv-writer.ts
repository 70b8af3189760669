/**
 * @fileoverview CSV Writer
 *
 * Serializes exporter output as CSV text, either as one document built from
 * the materialized form or line by line from the lazy form.
 */

import type { Row, TabularExporter } from "../exporters/base-exporter";

/**
 * Configuration options for CSV serialization
 */
export interface CSVWriterConfig {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Quote character for fields containing special characters (default: '"') */
  quote?: string;
  /** Line ending written after every row (default: '\r\n') */
  lineEnding?: "\n" | "\r\n" | "\r";
  /** Whether to quote all fields (default: false - only quote when necessary) */
  quoteAll?: boolean;
}

/**
 * Writes rows as CSV lines
 */
export class CSVWriter {
  private readonly config: Required<CSVWriterConfig>;

  constructor(config: CSVWriterConfig = {}) {
    this.config = {
      ...CSVWriter.getDefaultConfig(),
      ...config,
    };
  }

  /**
   * Escape a field value for CSV output
   */
  escapeField(value: string): string {
    const needsQuoting =
      this.config.quoteAll ||
      value.includes(this.config.delimiter) ||
      value.includes(this.config.quote) ||
      value.includes("\n") ||
      value.includes("\r");

    if (!needsQuoting) {
      return value;
    }

    // Escape quotes by doubling them
    const escapedValue = value
      .split(this.config.quote)
      .join(this.config.quote + this.config.quote);

    return `${this.config.quote}${escapedValue}${this.config.quote}`;
  }

  /**
   * Format one row as a CSV line, line ending included
   */
  formatRow(row: Row): string {
    // A lone empty cell is quoted so it reads back as one cell, not an empty row
    if (row.length === 1 && row[0] === "") {
      return `${this.config.quote}${this.config.quote}${this.config.lineEnding}`;
    }

    return (
      row.map((cell) => this.escapeField(cell)).join(this.config.delimiter) +
      this.config.lineEnding
    );
  }

  /**
   * Serialize a whole export
   */
  toCSV(exporter: TabularExporter): string {
    return exporter
      .toList()
      .map((row) => this.formatRow(row))
      .join("");
  }

  /**
   * Lazily serialize an export, one line per row
   */
  *lines(exporter: TabularExporter): Generator<string, void, undefined> {
    for (const row of exporter.iterRows()) {
      yield this.formatRow(row);
    }
  }

  /**
   * Get default configuration
   */
  static getDefaultConfig(): Required<CSVWriterConfig> {
    return {
      delimiter: ",",
      quote: '"',
      lineEnding: "\r\n",
      quoteAll: false,
    };
  }
}

/**
 * Convenience function to serialize an export as one CSV document
 */
export function toCSV(
  exporter: TabularExporter,
  config?: CSVWriterConfig,
): string {
  return new CSVWriter(config).toCSV(exporter);
}

/**
 * Convenience function to serialize an export lazily
 */
export function csvLines(
  exporter: TabularExporter,
  config?: CSVWriterConfig,
): Generator<string, void, undefined> {
  return new CSVWriter(config).lines(exporter);
}
