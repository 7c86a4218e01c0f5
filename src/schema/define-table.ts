/**
 * Primary API for describing tables.
 *
 * @module schema/define-table
 * @category Schema
 *
 * @example
 * ```typescript
 * import { defineTable, defineSchema, column } from 'graphseed/schema';
 *
 * const Pipeline = defineTable('pipeline', {
 *   id: column.uuid().primaryKey(),
 *   name: column.string(64),
 *   config: column.json(),
 * });
 *
 * const Job = defineTable('job', {
 *   id: column.string(16).primaryKey(),
 *   status: column.enum(['PENDING', 'RUNNING']),
 *   pipeline_id: column.uuid().references('pipeline'),
 * });
 *
 * const schema = defineSchema([Pipeline, Job]);
 * ```
 */

import { SchemaError } from '../errors';
import { toColumnDefinition, type ColumnBuilder } from './column';
import type { RelationSpec } from './relations';
import type { ColumnDefinition, EntityType, RelationDefinition, SchemaMap } from './types';

/**
 * Table options
 */
export interface TableOptions {
  /** Declared relationships keyed by property name */
  relations?: Record<string, RelationSpec>;
}

/**
 * Raw parts of an entity type, before validation.
 */
export interface EntityTypeInput {
  name: string;
  columns: readonly ColumnDefinition[];
  relations?: readonly RelationDefinition[];
  /** Explicit primary key; otherwise the flagged column, or 'id' */
  primaryKey?: string;
}

function resolvePrimaryKey(input: EntityTypeInput): string {
  if (input.primaryKey !== undefined) {
    if (!input.columns.some((col) => col.name === input.primaryKey)) {
      throw new SchemaError(`Table '${input.name}': primary key '${input.primaryKey}' is not a column`);
    }
    return input.primaryKey;
  }

  const flagged = input.columns.filter((col) => col.primaryKey);
  if (flagged.length > 1) {
    throw new SchemaError(
      `Table '${input.name}': composite primary keys are not supported (${flagged.map((c) => c.name).join(', ')})`
    );
  }
  if (flagged.length === 1) {
    return flagged[0].name;
  }
  if (input.columns.some((col) => col.name === 'id')) {
    return 'id';
  }
  throw new SchemaError(`Table '${input.name}' has no primary key column`);
}

/**
 * belongsTo without an explicit foreign key: use the only column whose
 * first foreign key points at the target.
 */
function resolveBelongsToKey(table: string, relation: RelationDefinition, columns: readonly ColumnDefinition[]): string {
  if (relation.foreignKey !== undefined) {
    if (!columns.some((col) => col.name === relation.foreignKey)) {
      throw new SchemaError(
        `Table '${table}': relation '${relation.name}' uses unknown foreign key column '${relation.foreignKey}'`
      );
    }
    return relation.foreignKey;
  }

  const candidates = columns.filter((col) => col.foreignKeys[0]?.table === relation.target);
  if (candidates.length !== 1) {
    throw new SchemaError(
      `Table '${table}': cannot determine the foreign key of relation '${relation.name}' ` +
      `(${candidates.length} columns reference '${relation.target}'). Pass { foreignKey } explicitly.`
    );
  }
  return candidates[0].name;
}

/**
 * Validate and freeze an entity type.
 *
 * Shared by {@link defineTable} and the JSON schema loader.
 *
 * @throws SchemaError on duplicate columns or relations, a missing primary key,
 *   or a belongsTo relation whose foreign key cannot be determined
 */
export function createEntityType(input: EntityTypeInput): EntityType {
  const seen = new Set<string>();
  for (const col of input.columns) {
    if (seen.has(col.name)) {
      throw new SchemaError(`Table '${input.name}': duplicate column '${col.name}'`);
    }
    seen.add(col.name);
  }

  const primaryKey = resolvePrimaryKey(input);
  const columns = input.columns.map((col) =>
    col.name === primaryKey && !col.primaryKey ? Object.freeze({ ...col, primaryKey: true }) : Object.freeze(col)
  );

  const relations: RelationDefinition[] = [];
  for (const relation of input.relations ?? []) {
    if (seen.has(relation.name)) {
      throw new SchemaError(`Table '${input.name}': relation '${relation.name}' collides with another property`);
    }
    seen.add(relation.name);

    relations.push(
      Object.freeze(
        relation.type === 'belongsTo'
          ? { ...relation, foreignKey: resolveBelongsToKey(input.name, relation, columns) }
          : { ...relation }
      )
    );
  }

  return Object.freeze({
    name: input.name,
    columns: Object.freeze(columns),
    relations: Object.freeze(relations),
    primaryKey,
  });
}

/**
 * Describe a table from column builders and named relations.
 *
 * @param name - Table name; the entity's identity
 * @param columns - Column builders keyed by column name, in table order
 * @param options - Declared relationships
 */
export function defineTable(
  name: string,
  columns: Record<string, ColumnBuilder>,
  options?: TableOptions
): EntityType {
  return createEntityType({
    name,
    columns: Object.entries(columns).map(([columnName, builder]) => toColumnDefinition(columnName, builder)),
    relations: Object.entries(options?.relations ?? {}).map(([relationName, spec]) => ({
      ...spec,
      name: relationName,
    })),
  });
}

/**
 * Collect entity types into a schema keyed by table name.
 *
 * @throws SchemaError if two tables share a name
 */
export function defineSchema(tables: readonly EntityType[]): SchemaMap {
  const schema = new Map<string, EntityType>();
  for (const table of tables) {
    if (schema.has(table.name)) {
      throw new SchemaError(`Table '${table.name}' is defined more than once`);
    }
    schema.set(table.name, table);
  }
  return schema;
}
