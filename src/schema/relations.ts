/**
 * Relation builder functions for declaring relationships between tables.
 * The relation's name is the key it is registered under in `defineTable`.
 *
 * @module schema/relations
 * @category Schema
 *
 * @example
 * ```typescript
 * import { defineTable, column, belongsTo, hasMany } from 'graphseed/schema';
 *
 * const Pipeline = defineTable('pipeline', {
 *   id: column.uuid().primaryKey(),
 * }, {
 *   relations: {
 *     stages: hasMany('stage', { foreignKey: 'pipeline_ref' }),
 *   },
 * });
 *
 * const Stage = defineTable('stage', {
 *   id: column.uuid().primaryKey(),
 *   pipeline_ref: column.uuid().references('pipeline'),
 * }, {
 *   relations: {
 *     pipeline: belongsTo('pipeline', { foreignKey: 'pipeline_ref' }),
 *   },
 * });
 * ```
 */

import type { RelationDefinition } from './types';

/**
 * A relation definition before it is named by `defineTable`.
 */
export type RelationSpec = Omit<RelationDefinition, 'name'>;

/**
 * Options shared by all relation builders
 */
export interface RelationOptions {
  /**
   * The foreign key column.
   * For belongsTo it lives on THIS table, for hasOne/hasMany on the target.
   */
  foreignKey?: string;
}

/**
 * Defines an inverse relationship where this table belongs to another.
 * The foreign key column is stored on THIS table.
 *
 * @example
 * ```typescript
 * // Job belongs to a pipeline
 * const Job = defineTable('job', {
 *   id: column.uuid().primaryKey(),
 *   pipeline_ref: column.uuid().references('pipeline'),
 * }, {
 *   relations: { pipeline: belongsTo('pipeline', { foreignKey: 'pipeline_ref' }) },
 * });
 * ```
 */
export function belongsTo(target: string, options?: RelationOptions): RelationSpec {
  return {
    type: 'belongsTo',
    target,
    foreignKey: options?.foreignKey,
  };
}

/**
 * Defines a one-to-one relationship. The foreign key is stored on the target.
 */
export function hasOne(target: string, options?: RelationOptions): RelationSpec {
  return {
    type: 'hasOne',
    target,
    foreignKey: options?.foreignKey,
  };
}

/**
 * Defines a one-to-many relationship. The foreign key is stored on the target,
 * and generated instances carry an array of related instances.
 */
export function hasMany(target: string, options?: RelationOptions): RelationSpec {
  return {
    type: 'hasMany',
    target,
    foreignKey: options?.foreignKey,
  };
}
