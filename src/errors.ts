/**
 * Error types thrown by graphseed.
 *
 * Every error here signals an incomplete schema, provider table or
 * configuration. None of them is recoverable within a generation session.
 *
 * @module errors
 * @category Errors
 */

/**
 * Base class for all graphseed errors.
 */
export class GraphseedError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'GraphseedError';
    this.code = code;
  }
}

/**
 * Thrown when a column's semantic type has no value provider.
 */
export class MissingProviderError extends GraphseedError {
  /** The table that owns the column */
  readonly entity: string;

  /** The column that could not be generated */
  readonly column: string;

  constructor(entity: string, column: string, kind: string) {
    super('MISSING_PROVIDER', `No value provider for column '${entity}.${column}' of type '${kind}'`);
    this.name = 'MissingProviderError';
    this.entity = entity;
    this.column = column;
  }
}

/**
 * Thrown when a table name is not part of the loaded schema.
 */
export class UnknownEntityError extends GraphseedError {
  /** The table name that was looked up */
  readonly entity: string;

  constructor(entity: string, referencedFrom?: string) {
    super(
      'UNKNOWN_ENTITY',
      referencedFrom
        ? `Entity '${entity}' referenced from '${referencedFrom}' is not defined in the schema`
        : `Entity '${entity}' is not defined in the schema`
    );
    this.name = 'UnknownEntityError';
    this.entity = entity;
  }
}

/**
 * Thrown for malformed table definitions or schema documents.
 */
export class SchemaError extends GraphseedError {
  constructor(message: string) {
    super('INVALID_SCHEMA', message);
    this.name = 'SchemaError';
  }
}

/**
 * Thrown for invalid configuration or override files.
 */
export class ConfigError extends GraphseedError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}
