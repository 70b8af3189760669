/**
 * @fileoverview Common exporter contract
 *
 * Every exporter kind produces the same thing: a header-label row followed by
 * data rows, each row a sequence of display strings. The lazy form is the
 * source of truth; the materialized form is built by draining it, so the two
 * can never disagree.
 */

import { environmentConfig } from "../config/environment";
import { ExportExhaustedError } from "../types/errors";

/**
 * One output row. The first row of an export holds the header labels.
 */
export type Row = readonly string[];

/**
 * Options shared by every exporter kind
 */
export interface ExporterOptions {
  /** Labels to place first, in this order; unlisted columns follow */
  headerOrder?: readonly string[];
  /** Display filename hint for delivery, without extension (default: EXPORT_FILENAME) */
  filename?: string;
  /** Content type label for delivery (default: EXPORT_CONTENT_TYPE) */
  contentType?: string;
}

/**
 * The single capability every exporter implements
 */
export interface TabularExporter {
  /** Starts a fresh lazy production of the export */
  iterRows(): RowCursor;
  /** Produces the whole export at once */
  toList(): Row[];
  getFilename(): string;
  getContentType(): string;
}

/**
 * Forward-only, single-pass cursor over an export's rows.
 *
 * Nothing is computed until a row is asked for, and at most one row is
 * computed ahead of the caller (by `hasNext()`).
 */
export class RowCursor implements IterableIterator<Row> {
  private pending: IteratorResult<Row, void> | undefined;
  private taken = 0;

  constructor(private readonly source: Iterator<Row, void>) {}

  /**
   * Whether another row is available. Computes that row if needed.
   */
  hasNext(): boolean {
    const pending = this.pending ?? this.source.next();
    this.pending = pending;
    return pending.done !== true;
  }

  /**
   * Takes the next row
   * @throws {ExportExhaustedError} When the export has no rows left
   */
  take(): Row {
    const result = this.hasNext() ? this.pending : undefined;
    this.pending = undefined;
    if (result === undefined || result.done === true) {
      throw new ExportExhaustedError(this.taken);
    }
    this.taken++;
    return result.value;
  }

  /** Number of rows taken so far */
  get rowsTaken(): number {
    return this.taken;
  }

  next(): IteratorResult<Row, undefined> {
    if (!this.hasNext()) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.take() };
  }

  [Symbol.iterator](): RowCursor {
    return this;
  }
}

/**
 * Abstract base providing the materialized form and delivery hints on top
 * of a row generator
 */
export abstract class BaseExporter implements TabularExporter {
  protected readonly headerOrder: readonly string[] | undefined;
  private readonly filename: string;
  private readonly contentType: string;

  constructor(options: ExporterOptions = {}) {
    this.headerOrder = options.headerOrder
      ? Object.freeze([...options.headerOrder])
      : undefined;
    this.filename = options.filename ?? environmentConfig.exportFilename;
    this.contentType =
      options.contentType ?? environmentConfig.exportContentType;
  }

  /**
   * Yields the export's rows, header row first
   */
  protected abstract generateRows(): Generator<Row, void, undefined>;

  /**
   * Rejects an exporter that cannot produce an export. Runs when a
   * production starts, before any row is computed.
   */
  protected validate(): void {}

  iterRows(): RowCursor {
    this.validate();
    return new RowCursor(this.generateRows());
  }

  toList(): Row[] {
    return Array.from(this.iterRows());
  }

  getFilename(): string {
    return this.filename;
  }

  getContentType(): string {
    return this.contentType;
  }
}
