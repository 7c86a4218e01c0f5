/**
 * Session-owned view of the schema.
 *
 * Inferred relationships are recorded here instead of on the caller's
 * entity types, so they never leak from one session into another.
 *
 * @module generator/resolved-schema
 * @category Generator
 */

import { UnknownEntityError } from '../errors';
import type { EntityType, RelationDefinition, SchemaMap } from '../schema/types';

/**
 * Copy-on-write map of entity types.
 *
 * @example
 * ```typescript
 * const resolved = new ResolvedSchema(schema);
 * resolved.declare('job', { name: 'pipeline', type: 'belongsTo', target: 'pipeline', foreignKey: 'pipeline_id' });
 * resolved.entity('job').relations; // includes 'pipeline'
 * schema.get('job')?.relations;     // unchanged
 * ```
 */
export class ResolvedSchema {
  private readonly entities: Map<string, EntityType>;

  constructor(source: SchemaMap) {
    this.entities = new Map(source);
  }

  /**
   * Look up an entity type.
   *
   * @param referencedFrom - Where the name came from, for error messages
   * @throws UnknownEntityError if the table is not in the schema
   */
  entity(name: string, referencedFrom?: string): EntityType {
    const entity = this.entities.get(name);
    if (!entity) {
      throw new UnknownEntityError(name, referencedFrom);
    }
    return entity;
  }

  /**
   * Add a relationship to an entity type's declared set.
   * Declaring a relationship whose name is already present is a no-op.
   *
   * @returns true if the relationship was added
   */
  declare(name: string, relation: RelationDefinition): boolean {
    const entity = this.entity(name);
    if (entity.relations.some((existing) => existing.name === relation.name)) {
      return false;
    }
    this.entities.set(
      name,
      Object.freeze({
        ...entity,
        relations: Object.freeze([...entity.relations, Object.freeze({ ...relation })]),
      })
    );
    return true;
  }
}
