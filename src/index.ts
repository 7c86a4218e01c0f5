/**
 * graphseed - schema-consistent fixture graphs for relational models
 *
 * Describe your tables once, then ask for any entity and get one coherent
 * instance graph with every required related row in place.
 *
 * @packageDocumentation
 */

// Schema description
export * from './schema';

// Factory graph generation
export * from './generator';

// JSON column samples
export * from './samples';

// Configuration
export { loadConfig, getDefaultConfig, parseConfig, CONFIG_FILE } from './cli/config';
export type { GraphseedConfig } from './cli/types';

// Errors
export {
  GraphseedError,
  MissingProviderError,
  UnknownEntityError,
  SchemaError,
  ConfigError,
} from './errors';

// Logging
export { createLogger, silentLogger } from './logger';
export type { Logger, LoggerConfig, LogLevel, LogSink } from './logger';
