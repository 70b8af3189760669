/**
 * @fileoverview Record-source exporter
 *
 * Projects records into rows through a fixed set of header bindings. Concrete
 * exporters supply the records by implementing `fetchRecords()`.
 */

import { ExporterMisuseError } from "../types/errors";
import { BaseExporter, type ExporterOptions, type Row } from "./base-exporter";
import type { Header } from "./header";

/**
 * Options for record-source exporters
 */
export interface RecordExporterOptions<T> extends ExporterOptions {
  /** Column bindings in declaration order. Required unless `getHeaders()` is overridden. */
  headers?: readonly Header<T>[];
}

/**
 * Generic exporter over records of type `T`
 */
export abstract class RecordExporter<T> extends BaseExporter {
  private readonly headers: readonly Header<T>[] | undefined;

  constructor(options: RecordExporterOptions<T> = {}) {
    super(options);
    this.headers = options.headers
      ? Object.freeze([...options.headers])
      : undefined;
  }

  /**
   * Fetches the records to export. Called once per production; must return
   * the same sequence for the duration of that production.
   */
  abstract fetchRecords(): Iterable<T>;

  /**
   * Declared header bindings, before any reordering
   * @throws {ExporterMisuseError} When no bindings were declared
   */
  getHeaders(): readonly Header<T>[] {
    if (this.headers === undefined) {
      throw new ExporterMisuseError(
        `${this.constructor.name} declares no header bindings`,
        this.constructor.name,
        "headers",
      );
    }
    return this.headers;
  }

  getSortedHeaders(): readonly Header<T>[] {
    return this.sortHeaders(this.getHeaders());
  }

  getHeaderLabels(): string[] {
    return this.getSortedHeaders().map((header) => header.label);
  }

  /**
   * Places headers listed in `headerOrder` first, in that order. Unlisted
   * headers follow in declaration order. Only permutes: nothing is dropped
   * or duplicated.
   */
  sortHeaders(headers: readonly Header<T>[]): readonly Header<T>[] {
    const order = this.headerOrder;
    if (order === undefined || order.length === 0) {
      return headers;
    }

    const positions = new Map<string, number>();
    order.forEach((label, index) => {
      if (!positions.has(label)) {
        positions.set(label, index);
      }
    });

    // Array.prototype.sort is stable, so ties keep declaration order
    return headers
      .map((header) => ({
        header,
        key: positions.get(header.label) ?? order.length,
      }))
      .sort((a, b) => a.key - b.key)
      .map(({ header }) => header);
  }

  protected override validate(): void {
    if (typeof this.fetchRecords !== "function") {
      throw new ExporterMisuseError(
        `${this.constructor.name} does not implement fetchRecords`,
        this.constructor.name,
        "fetchRecords",
      );
    }
    this.getHeaders();
  }

  protected *generateRows(): Generator<Row, void, undefined> {
    const records = this.fetchRecords();
    const headers = this.getSortedHeaders();

    yield headers.map((header) => header.label);
    for (const record of records) {
      yield headers.map((header) => header.extract(record));
    }
  }
}

/**
 * Plain-function definition of a record-source exporter
 */
export interface RecordExporterDefinition<T> extends RecordExporterOptions<T> {
  fetchRecords: () => Iterable<T>;
}

class DefinedRecordExporter<T> extends RecordExporter<T> {
  private readonly source: () => Iterable<T>;

  constructor(definition: RecordExporterDefinition<T>) {
    super(definition);
    this.source = definition.fetchRecords;
  }

  fetchRecords(): Iterable<T> {
    return this.source();
  }

  protected override validate(): void {
    if (typeof this.source !== "function") {
      throw new ExporterMisuseError(
        "Exporter definition has no fetchRecords function",
        this.constructor.name,
        "fetchRecords",
      );
    }
    super.validate();
  }
}

/**
 * Builds a record-source exporter from a record source and header bindings,
 * without declaring a subclass
 *
 * @example
 * ```typescript
 * const exporter = defineRecordExporter({
 *   headers: [new Header<User>("name", (user) => user.name)],
 *   fetchRecords: () => users,
 * });
 * ```
 */
export function defineRecordExporter<T>(
  definition: RecordExporterDefinition<T>,
): RecordExporter<T> {
  return new DefinedRecordExporter(definition);
}
