/**
 * Relationship Resolver - finds the associations of an entity type
 *
 * Declared relationships come from the schema. Foreign-key columns that no
 * declared relationship covers are turned into inferred `belongsTo`
 * relationships when their name ends with the foreign key suffix.
 *
 * @module generator/resolver
 * @category Generator
 */

import type { EntityType, RelationDefinition } from '../schema/types';

/**
 * Default suffix marking foreign-key columns, e.g. `pipeline_id`.
 */
export const DEFAULT_FOREIGN_KEY_SUFFIX = '_id';

/**
 * Result of resolving an entity type's relationships.
 */
export interface ResolvedRelationships {
  /** Local join columns of every declared relationship */
  coveredColumns: ReadonlySet<string>;
  /** Relationships synthesized from foreign-key naming */
  inferred: RelationDefinition[];
}

/**
 * Local side of a declared relationship's join.
 * belongsTo joins on its own foreign key, hasOne/hasMany on the primary key.
 */
export function localJoinColumns(entity: EntityType, relation: RelationDefinition): string[] {
  if (relation.type === 'belongsTo') {
    return relation.foreignKey === undefined ? [] : [relation.foreignKey];
  }
  return [entity.primaryKey];
}

/**
 * Resolve declared coverage and inferred relationships for an entity type.
 *
 * @param entity - The entity type to inspect
 * @param suffix - Foreign key column suffix (default: '_id')
 *
 * @example
 * ```typescript
 * const { inferred } = resolveRelationships(Job);
 * // => [{ name: 'pipeline', type: 'belongsTo', target: 'pipeline', foreignKey: 'pipeline_id', inferred: true }]
 * ```
 */
export function resolveRelationships(
  entity: EntityType,
  suffix: string = DEFAULT_FOREIGN_KEY_SUFFIX
): ResolvedRelationships {
  const coveredColumns = new Set<string>();
  for (const relation of entity.relations) {
    for (const columnName of localJoinColumns(entity, relation)) {
      coveredColumns.add(columnName);
    }
  }

  const taken = new Set<string>([
    ...entity.columns.map((col) => col.name),
    ...entity.relations.map((relation) => relation.name),
  ]);

  const inferred: RelationDefinition[] = [];
  for (const col of entity.columns) {
    // Composite / multi-target keys: only the first reference is followed
    const reference = col.foreignKeys[0];
    if (!reference) {
      continue;
    }
    if (coveredColumns.has(col.name) || !col.name.endsWith(suffix) || col.name.length === suffix.length) {
      continue;
    }

    const name = col.name.slice(0, -suffix.length);
    // A property of that name already exists on the instance
    if (taken.has(name)) {
      continue;
    }

    inferred.push({
      name,
      type: 'belongsTo',
      target: reference.table,
      foreignKey: col.name,
      inferred: true,
    });
  }

  return { coveredColumns, inferred };
}
