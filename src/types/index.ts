/**
 * Central type definitions for the tabular export package
 *
 * This barrel file exports all types for convenient importing:
 * import { EnvironmentConfig, ExporterMisuseError } from '../types';
 */

// Environment types
export * from "./environment";

// Error handling types
export * from "./errors";
