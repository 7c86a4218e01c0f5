/**
 * Factory Registry & Instance Cache
 *
 * Both tables are keyed by entity name and owned by a generation session.
 *
 * @module generator/registry
 * @category Generator
 */

import type { EntityInstance } from '../schema/types';

/**
 * Produces the single instance of one entity type.
 *
 * @example
 * ```typescript
 * const jobFactory = session.build('job');
 * const job = jobFactory();
 * jobFactory() === job; // => true
 * ```
 */
export interface Factory<T extends EntityInstance = EntityInstance> {
  (): T;
  /** Table the factory generates */
  readonly entity: string;
}

/**
 * Built factories. A factory is registered once and never replaced.
 */
export class FactoryRegistry {
  private factories = new Map<string, Factory>();

  get(entity: string): Factory | undefined {
    return this.factories.get(entity);
  }

  /**
   * @throws Error if a factory is already registered for the entity
   */
  register(factory: Factory): void {
    if (this.factories.has(factory.entity)) {
      throw new Error(`Factory for '${factory.entity}' is already registered`);
    }
    this.factories.set(factory.entity, factory);
  }

  /** Registered entity names, in registration order */
  entities(): string[] {
    return [...this.factories.keys()];
  }

  clear(): void {
    this.factories.clear();
  }
}

/**
 * A materialized instance together with its table.
 */
export interface CachedInstance {
  entity: string;
  instance: EntityInstance;
}

/**
 * Instances produced during a session, one per entity type.
 */
export class InstanceCache {
  private instances = new Map<string, EntityInstance>();
  /** entity → tables its foreign keys point at */
  private parents = new Map<string, Set<string>>();

  get(entity: string): EntityInstance | undefined {
    return this.instances.get(entity);
  }

  /**
   * @throws Error if the entity already has an instance
   */
  set(entity: string, instance: EntityInstance): void {
    if (this.instances.has(entity)) {
      throw new Error(`Instance for '${entity}' is already cached`);
    }
    this.instances.set(entity, instance);
  }

  /**
   * Record that `entity` holds a foreign key to `parent`.
   */
  link(entity: string, parent: string): void {
    if (entity === parent) {
      return;
    }
    const parents = this.parents.get(entity) ?? new Set<string>();
    parents.add(parent);
    this.parents.set(entity, parents);
  }

  /**
   * Instances in insertion order: every row comes after the rows its
   * foreign keys point at, otherwise in creation order. A child cached
   * before a parent that later backfills it moves behind that parent.
   */
  list(): CachedInstance[] {
    const ordered: CachedInstance[] = [];
    const placed = new Set<string>();
    const visiting = new Set<string>();

    const place = (entity: string): void => {
      const instance = this.instances.get(entity);
      if (!instance || placed.has(entity) || visiting.has(entity)) {
        return;
      }
      visiting.add(entity);
      for (const parent of this.parents.get(entity) ?? []) {
        place(parent);
      }
      visiting.delete(entity);
      placed.add(entity);
      ordered.push({ entity, instance });
    };

    for (const entity of this.instances.keys()) {
      place(entity);
    }
    return ordered;
  }

  clear(): void {
    this.instances.clear();
    this.parents.clear();
  }
}
