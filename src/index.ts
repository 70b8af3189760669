/**
 * @fileoverview Tabular export package entry point
 *
 * Projects in-memory records into rows of display strings and hands those
 * rows to delivery writers.
 *
 * @example
 * ```typescript
 * import { FieldExporter, MultiExporter, toCSV } from 'tabular-export';
 *
 * const exporter = new MultiExporter([
 *   new FieldExporter(['sku', 'qty'], stock, { headerOrder: ['qty'] }),
 *   new FieldExporter(['sku', 'price'], prices),
 * ]);
 * const csv = toCSV(exporter);
 * ```
 */

export * from './exporters';
export * from './output';
export * from './types';
export { environmentConfig, loadEnvironmentConfig } from './config/environment';
export { Logger, LogLevel, logger, createCorrelatedLogger } from './utils/logger';
export type { LogContext } from './utils/logger';
