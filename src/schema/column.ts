/**
 * Column builder functions for the graphseed schema DSL.
 * Provides a fluent API for describing table columns with chainable modifiers.
 *
 * @module schema/column
 * @category Schema
 *
 * @example
 * ```typescript
 * import { column, defineTable } from 'graphseed/schema';
 *
 * const Job = defineTable('job', {
 *   id: column.uuid().primaryKey(),
 *   name: column.string(128),
 *   status: column.enum(['PENDING', 'RUNNING', 'DONE']),
 *   pipeline_id: column.uuid().references('pipeline'),
 *   finished_at: column.timestamp().nullable(),
 * });
 * ```
 */

import type { ColumnDefinition, ColumnType, ForeignKeyReference } from './types';

// ============================================================================
// Builder
// ============================================================================

/**
 * Internal state for column builder
 * @internal
 */
interface BuilderState {
  type: ColumnType;
  isPrimaryKey: boolean;
  isNullable: boolean;
  foreignKeys: readonly ForeignKeyReference[];
}

/**
 * Chainable column description. Every modifier returns a new builder.
 */
export interface ColumnBuilder {
  readonly type: ColumnType;
  readonly isPrimaryKey: boolean;
  readonly isNullable: boolean;
  readonly foreignKeys: readonly ForeignKeyReference[];

  /** Mark the column as the table's primary key */
  primaryKey(): ColumnBuilder;
  /** Mark the column as nullable */
  nullable(): ColumnBuilder;
  /** Add a foreign key to `table.column` (column defaults to 'id') */
  references(table: string, column?: string): ColumnBuilder;
}

function createColumnBuilder(state: BuilderState): ColumnBuilder {
  return {
    type: state.type,
    isPrimaryKey: state.isPrimaryKey,
    isNullable: state.isNullable,
    foreignKeys: state.foreignKeys,

    primaryKey(): ColumnBuilder {
      return createColumnBuilder({ ...state, isPrimaryKey: true });
    },

    nullable(): ColumnBuilder {
      return createColumnBuilder({ ...state, isNullable: true });
    },

    references(table: string, column = 'id'): ColumnBuilder {
      return createColumnBuilder({
        ...state,
        foreignKeys: [...state.foreignKeys, { table, column }],
      });
    },
  };
}

function builderFor(type: ColumnType): ColumnBuilder {
  return createColumnBuilder({ type, isPrimaryKey: false, isNullable: false, foreignKeys: [] });
}

/**
 * Convert a builder into a named column definition.
 * @internal
 */
export function toColumnDefinition(name: string, builder: ColumnBuilder): ColumnDefinition {
  return Object.freeze({
    name,
    type: builder.type,
    primaryKey: builder.isPrimaryKey,
    nullable: builder.isNullable,
    foreignKeys: Object.freeze([...builder.foreignKeys]),
  });
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Column type constructors.
 */
export const column = {
  /** Variable-length string, optionally bounded */
  string: (length?: number): ColumnBuilder =>
    builderFor(length === undefined ? { kind: 'string' } : { kind: 'string', length }),

  /** Whole number */
  integer: (): ColumnBuilder => builderFor({ kind: 'integer' }),

  /** Floating-point number */
  float: (): ColumnBuilder => builderFor({ kind: 'float' }),

  /** true / false */
  boolean: (): ColumnBuilder => builderFor({ kind: 'boolean' }),

  /** Date and time */
  timestamp: (): ColumnBuilder => builderFor({ kind: 'timestamp' }),

  /** One of a fixed set of string values */
  enum: (values: readonly string[]): ColumnBuilder => builderFor({ kind: 'enum', values: [...values] }),

  /** Opaque structured value */
  json: (): ColumnBuilder => builderFor({ kind: 'json' }),

  /** UUID-typed identifier */
  uuid: (): ColumnBuilder => builderFor({ kind: 'uuid' }),
};
