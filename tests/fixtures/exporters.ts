/**
 * Shared exporter fixtures for unit tests
 */

import { Header } from "../../src/exporters/header";
import {
  RecordExporter,
  type RecordExporterOptions,
} from "../../src/exporters/record-exporter";

export interface Reading {
  a: string;
  b: number;
  c: number;
}

export const READINGS: readonly Reading[] = [
  { a: "a", b: 1, c: 1.5 },
  { a: "b", b: 2, c: 2.5 },
  { a: "c", b: 3, c: 3.5 },
];

export const READING_HEADERS: readonly Header<Reading>[] = [
  new Header<Reading>("a", (reading) => reading.a),
  new Header<Reading>("b", (reading) => String(reading.b)),
  new Header<Reading>("c", (reading) => String(reading.c)),
];

/**
 * Exporter over three fixed readings with columns a, b, c
 */
export class ReadingExporter extends RecordExporter<Reading> {
  fetchCount = 0;

  constructor(
    options: Omit<RecordExporterOptions<Reading>, "headers"> = {},
    private readonly readings: readonly Reading[] = READINGS,
  ) {
    super({ ...options, headers: READING_HEADERS });
  }

  fetchRecords(): readonly Reading[] {
    this.fetchCount++;
    return this.readings;
  }
}

/**
 * Exporter with a single column over plain strings
 */
export class WordExporter extends RecordExporter<string> {
  constructor(private readonly words: readonly string[] = ["llama", "drama"]) {
    super({ headers: [new Header<string>("word", (word) => word)] });
  }

  fetchRecords(): readonly string[] {
    return this.words;
  }
}
