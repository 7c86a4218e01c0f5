/**
 * Generation Session - owns the registries for one fixture run
 *
 * @module generator/session
 * @category Generator
 */

import { silentLogger, type Logger } from '../logger';
import type { EntityInstance, EntityType, SchemaMap } from '../schema/types';
import { FactoryBuilder } from './builder';
import { OverrideTable, type OverrideMap } from './overrides';
import { ProviderRegistry } from './providers';
import { FactoryRegistry, InstanceCache, type CachedInstance, type Factory } from './registry';
import { ResolvedSchema } from './resolved-schema';
import { DEFAULT_FOREIGN_KEY_SUFFIX } from './resolver';

/**
 * Options for {@link createSession}.
 */
export interface SessionOptions {
  /** Entity types keyed by table name */
  schema: SchemaMap;
  /** Override sources, merged in order (later wins) */
  overrides?: OverrideMap | OverrideMap[] | OverrideTable;
  /** Value providers (default: Faker-backed defaults) */
  providers?: ProviderRegistry;
  /** Logger (default: silent) */
  logger?: Logger;
  /** Suffix marking foreign-key columns for inference (default: '_id') */
  foreignKeySuffix?: string;
}

/**
 * One generation run. Holds the factory registry, the instance cache and
 * the resolved schema; nothing is shared between sessions.
 */
export interface GenerationSession {
  /** The session's view of the schema, including inferred relationships */
  readonly schema: ResolvedSchema;
  /** Get (building if needed) the factory for an entity type */
  build(entity: string | EntityType): Factory;
  /** Shorthand for `build(entity)()` */
  generate(entity: string | EntityType): EntityInstance;
  /** Materialized instances in insertion order, parents first */
  instances(): CachedInstance[];
  /** Primary key value of every materialized instance, keyed by table */
  primaryKeys(): Record<string, unknown>;
  /**
   * Discard factories and instances. Relationships already inferred stay
   * declared, so later builds reuse them.
   */
  reset(): void;
}

function toOverrideTable(overrides: SessionOptions['overrides']): OverrideTable {
  if (overrides instanceof OverrideTable) {
    return overrides;
  }
  if (Array.isArray(overrides)) {
    return new OverrideTable(...overrides);
  }
  return overrides ? new OverrideTable(overrides) : new OverrideTable();
}

/**
 * Create a generation session.
 *
 * @example
 * ```typescript
 * const session = createSession({
 *   schema: defineSchema([Pipeline, Job]),
 *   overrides: [samples, { job: { status: 'RUNNING' } }],
 * });
 *
 * const job = session.build('job')();
 * job.status;   // => 'RUNNING'
 * job.pipeline; // => the pipeline instance
 *
 * for (const { entity, instance } of session.instances()) {
 *   await db.insert(entity, instance);
 * }
 * ```
 */
export function createSession(options: SessionOptions): GenerationSession {
  const schema = new ResolvedSchema(options.schema);
  const factories = new FactoryRegistry();
  const instances = new InstanceCache();

  const builder = new FactoryBuilder({
    schema,
    providers: options.providers ?? new ProviderRegistry(),
    overrides: toOverrideTable(options.overrides),
    factories,
    instances,
    logger: options.logger ?? silentLogger,
    foreignKeySuffix: options.foreignKeySuffix ?? DEFAULT_FOREIGN_KEY_SUFFIX,
  });

  return {
    schema,

    build(entity) {
      return builder.build(entity);
    },

    generate(entity) {
      return builder.build(entity)();
    },

    instances() {
      return instances.list();
    },

    primaryKeys() {
      const keys: Record<string, unknown> = {};
      for (const { entity, instance } of instances.list()) {
        keys[entity] = instance[schema.entity(entity).primaryKey];
      }
      return keys;
    },

    reset() {
      factories.clear();
      instances.clear();
    },
  };
}
