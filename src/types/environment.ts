/**
 * Environment configuration types
 */

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface EnvironmentConfig {
  environment: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  exportFilename: string;
  exportContentType: string;
}
