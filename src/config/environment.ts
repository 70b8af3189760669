import { ConfigurationError } from '../types/errors';
import type { EnvironmentConfig, LogLevelName } from '../types/environment';

/**
 * Default values for environment configuration
 */
const DEFAULTS = {
  NODE_ENV: 'development',
  LOG_LEVEL: 'INFO',
  EXPORT_FILENAME: 'export',
  EXPORT_CONTENT_TYPE: 'text/csv',
} as const;

const ALLOWED_ENVIRONMENTS = ['development', 'production', 'test'] as const;
const ALLOWED_LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

const isEnvironment = (
  value: string,
): value is EnvironmentConfig['environment'] =>
  (ALLOWED_ENVIRONMENTS as readonly string[]).includes(value);

const isLogLevel = (value: string): value is LogLevelName =>
  (ALLOWED_LOG_LEVELS as readonly string[]).includes(value);

/**
 * Reads the environment configuration from a variable map, applying defaults
 * @param env - Variable map, `process.env` unless given
 * @throws {ConfigurationError} When a variable holds an unsupported value
 */
export const loadEnvironmentConfig = (
  env: NodeJS.ProcessEnv = process.env,
): EnvironmentConfig => {
  const nodeEnv = env.NODE_ENV || DEFAULTS.NODE_ENV;
  if (!isEnvironment(nodeEnv)) {
    throw new ConfigurationError(
      `Invalid NODE_ENV: "${nodeEnv}". Must be one of: ${ALLOWED_ENVIRONMENTS.join(', ')}`,
      'NODE_ENV',
    );
  }

  const logLevel = (env.LOG_LEVEL || DEFAULTS.LOG_LEVEL).toUpperCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${ALLOWED_LOG_LEVELS.join(', ')}`,
      'LOG_LEVEL',
    );
  }

  const exportFilename = env.EXPORT_FILENAME || DEFAULTS.EXPORT_FILENAME;
  if (/["\r\n]/.test(exportFilename)) {
    throw new ConfigurationError(
      `Invalid EXPORT_FILENAME: must not contain quotes or line breaks`,
      'EXPORT_FILENAME',
    );
  }

  return {
    environment: nodeEnv,
    logLevel,
    exportFilename,
    exportContentType: env.EXPORT_CONTENT_TYPE || DEFAULTS.EXPORT_CONTENT_TYPE,
  };
};

/**
 * Environment configuration instance with validation and defaults applied
 * @throws {ConfigurationError} When environment validation fails
 */
export const environmentConfig = loadEnvironmentConfig();
