/**
 * Core type definitions for the graphseed schema description
 *
 * @module schema/types
 * @category Schema
 */

// ============================================================================
// Column Types
// ============================================================================

/**
 * Semantic column type. Each kind maps to exactly one value provider.
 *
 * @example
 * ```typescript
 * const status: ColumnType = { kind: 'enum', values: ['PENDING', 'RUNNING'] };
 * const name: ColumnType = { kind: 'string', length: 64 };
 * ```
 */
export type ColumnType =
  | { kind: 'string'; length?: number }
  | { kind: 'integer' }
  | { kind: 'float' }
  | { kind: 'boolean' }
  | { kind: 'timestamp' }
  | { kind: 'enum'; values: readonly string[] }
  | { kind: 'json' }
  | { kind: 'uuid' };

/**
 * Discriminator of {@link ColumnType}
 */
export type ColumnKind = ColumnType['kind'];

/**
 * All column kinds, in declaration order
 */
export const COLUMN_KINDS = [
  'string',
  'integer',
  'float',
  'boolean',
  'timestamp',
  'enum',
  'json',
  'uuid',
] as const satisfies readonly ColumnKind[];

/**
 * Target of a foreign key: a column on another (or the same) table
 */
export interface ForeignKeyReference {
  /** Referenced table name */
  table: string;
  /** Referenced column name */
  column: string;
}

/**
 * Describes one column of a table.
 */
export interface ColumnDefinition {
  /** Column name, also the property name on generated instances */
  name: string;
  /** Semantic type */
  type: ColumnType;
  /** Whether this column is the table's primary key */
  primaryKey: boolean;
  /** Whether the column accepts null */
  nullable: boolean;
  /** Foreign keys in declaration order. Only the first is followed. */
  foreignKeys: readonly ForeignKeyReference[];
}

// ============================================================================
// Relation Types
// ============================================================================

/**
 * Relationship kinds.
 *
 * - `belongsTo`: the foreign key is a column of this table
 * - `hasOne`: the foreign key is on the target, single related instance
 * - `hasMany`: the foreign key is on the target, collection of instances
 */
export type RelationType = 'belongsTo' | 'hasOne' | 'hasMany';

/**
 * A directional edge from one entity type to another.
 *
 * @example
 * ```typescript
 * const pipeline: RelationDefinition = {
 *   name: 'pipeline',
 *   type: 'belongsTo',
 *   target: 'pipeline',
 *   foreignKey: 'pipeline_id',
 * };
 * ```
 */
export interface RelationDefinition {
  /** Property name on generated instances */
  name: string;
  /** The type of relationship */
  type: RelationType;
  /** The target table name */
  target: string;
  /** Foreign key column (on this table for belongsTo, on the target otherwise) */
  foreignKey?: string;
  /** Set when the relationship was synthesized from a naming convention */
  inferred?: boolean;
}

/**
 * Whether a relationship produces a collection of related instances
 */
export function isCollection(relation: RelationDefinition): boolean {
  return relation.type === 'hasMany';
}

// ============================================================================
// Entity Types
// ============================================================================

/**
 * Schema description of one relational table.
 * The table name is the entity's identity everywhere in graphseed.
 */
export interface EntityType {
  /** Table name */
  readonly name: string;
  /** Columns in table order */
  readonly columns: readonly ColumnDefinition[];
  /** Declared relationships */
  readonly relations: readonly RelationDefinition[];
  /** Name of the primary key column */
  readonly primaryKey: string;
}

/**
 * Entity types keyed by table name
 */
export type SchemaMap = ReadonlyMap<string, EntityType>;

/**
 * A generated record. Column values and relationship properties share one object.
 */
export type EntityInstance = Record<string, unknown>;
