/**
 * graphseed schema description - tables, columns and relationships
 *
 * @module schema
 * @category Schema
 *
 * @example
 * ```typescript
 * import { defineTable, defineSchema, column, hasMany } from 'graphseed/schema';
 *
 * const Pipeline = defineTable('pipeline', {
 *   id: column.uuid().primaryKey(),
 *   name: column.string(64),
 * }, {
 *   relations: { jobs: hasMany('job', { foreignKey: 'pipeline_id' }) },
 * });
 *
 * const Job = defineTable('job', {
 *   id: column.uuid().primaryKey(),
 *   pipeline_id: column.uuid().references('pipeline'),
 * });
 *
 * const schema = defineSchema([Pipeline, Job]);
 * ```
 */

// Type definitions
export * from './types';

// Column builder API
export { column } from './column';
export type { ColumnBuilder } from './column';

// Relation builders
export { belongsTo, hasOne, hasMany } from './relations';
export type { RelationOptions, RelationSpec } from './relations';

// Table definition
export { createEntityType, defineSchema, defineTable } from './define-table';
export type { EntityTypeInput, TableOptions } from './define-table';

// JSON schema documents
export { loadSchemaFile, parseSchema } from './loader';
