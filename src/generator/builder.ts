/**
 * Factory Graph Builder - derives one factory per entity type
 *
 * Walks the relationship graph from a root entity type, building the
 * factory of every reachable type on demand. Each factory produces the
 * single instance of its type and wires related instances through
 * nested factory calls. Edges back into the current path are omitted.
 *
 * @module generator/builder
 * @category Generator
 */

import { SchemaError } from '../errors';
import type { Logger } from '../logger';
import { isCollection, type EntityInstance, type EntityType, type RelationDefinition } from '../schema/types';
import { overrideProvider, type OverrideTable } from './overrides';
import type { ProviderRegistry, ValueProvider } from './providers';
import type { FactoryRegistry, Factory, InstanceCache } from './registry';
import type { ResolvedSchema } from './resolved-schema';
import { resolveRelationships } from './resolver';

/**
 * Collaborators of the builder. All of them belong to one session.
 */
export interface FactoryBuilderContext {
  schema: ResolvedSchema;
  providers: ProviderRegistry;
  overrides: OverrideTable;
  factories: FactoryRegistry;
  instances: InstanceCache;
  logger: Logger;
  foreignKeySuffix: string;
}

/**
 * How a column gets its value
 * @internal
 */
type ColumnPlan =
  | { source: 'value'; column: string; provide: ValueProvider }
  | { source: 'link'; column: string; relation: string; targetColumn: string };

/**
 * A relationship wired to the target's factory
 * @internal
 */
interface Wiring {
  relation: RelationDefinition;
  factory: Factory;
  /** For hasOne/hasMany: child column receiving this instance's primary key */
  backfill?: string;
}

/**
 * Builds and registers factories.
 *
 * @example
 * ```typescript
 * const builder = new FactoryBuilder(context);
 * const jobFactory = builder.build('job');
 * const job = jobFactory();
 * job.pipeline; // => the pipeline instance
 * ```
 */
export class FactoryBuilder {
  constructor(private readonly ctx: FactoryBuilderContext) {}

  /**
   * Get the factory for an entity type, building it and every factory it
   * depends on if needed.
   *
   * @param entity - Table name or entity type
   * @param visited - Entity types on the current path; never mutated
   * @throws UnknownEntityError if the entity, a relationship target or a
   *   foreign key target is not in the schema
   * @throws MissingProviderError if a column type has no value provider
   */
  build(entity: string | EntityType, visited: ReadonlySet<string> = new Set()): Factory {
    const name = typeof entity === 'string' ? entity : entity.name;

    const existing = this.ctx.factories.get(name);
    if (existing) {
      return existing;
    }

    const type = this.ctx.schema.entity(name);
    const path = new Set(visited);
    path.add(name);

    this.checkForeignKeys(type);

    const { inferred } = resolveRelationships(type, this.ctx.foreignKeySuffix);
    for (const relation of inferred) {
      if (this.ctx.schema.declare(name, relation)) {
        this.ctx.logger.info(`Inferred relation ${name}.${relation.name} -> ${relation.target} from column '${relation.foreignKey}'`);
      }
    }

    const single: Wiring[] = [];
    const collections: Wiring[] = [];
    const relationOverrides: ColumnPlan[] = [];
    const omittedKeys = new Set<string>();

    for (const relation of [...type.relations, ...inferred]) {
      const target = this.ctx.schema.entity(relation.target, `${name}.${relation.name}`);

      const override = this.ctx.overrides.get(name, relation.name);
      if (override.found) {
        relationOverrides.push({ source: 'value', column: relation.name, provide: overrideProvider(override.value) });
        continue;
      }

      if (path.has(relation.target)) {
        this.ctx.logger.debug(`Omitting cyclic relation ${name}.${relation.name} -> ${relation.target}`);
        if (relation.type === 'belongsTo' && relation.foreignKey !== undefined) {
          omittedKeys.add(relation.foreignKey);
        }
        continue;
      }

      const wiring: Wiring = {
        relation,
        factory: this.build(target.name, path),
        backfill: this.backfillColumn(type, relation, target),
      };
      (isCollection(relation) ? collections : single).push(wiring);
    }

    const plans = [...this.planColumns(type, single, omittedKeys), ...relationOverrides];
    const factory = this.assemble(type, plans, single, collections);

    this.ctx.factories.register(factory);
    this.ctx.logger.debug(`Built factory for ${name}`, {
      relations: [...single, ...collections].map((wiring) => wiring.relation.name),
    });

    return factory;
  }

  /**
   * Every foreign key must point at a known table.
   */
  private checkForeignKeys(type: EntityType): void {
    for (const col of type.columns) {
      const reference = col.foreignKeys[0];
      if (reference) {
        this.ctx.schema.entity(reference.table, `${type.name}.${col.name}`);
      }
    }
  }

  /**
   * For hasOne/hasMany with a foreign key, the child column that points back.
   */
  private backfillColumn(type: EntityType, relation: RelationDefinition, target: EntityType): string | undefined {
    if (relation.type === 'belongsTo' || relation.foreignKey === undefined) {
      return undefined;
    }
    if (!target.columns.some((col) => col.name === relation.foreignKey)) {
      throw new SchemaError(
        `Relation ${type.name}.${relation.name}: foreign key '${relation.foreignKey}' is not a column of '${target.name}'`
      );
    }
    return relation.foreignKey;
  }

  private planColumns(
    type: EntityType,
    single: readonly Wiring[],
    omittedKeys: ReadonlySet<string>
  ): ColumnPlan[] {
    const links = new Map<string, { relation: string; targetColumn: string }>();
    for (const { relation } of single) {
      if (relation.type !== 'belongsTo' || relation.foreignKey === undefined) {
        continue;
      }
      const col = type.columns.find((candidate) => candidate.name === relation.foreignKey);
      const targetColumn = col?.foreignKeys[0]?.column ?? this.ctx.schema.entity(relation.target).primaryKey;
      links.set(relation.foreignKey, { relation: relation.name, targetColumn });
    }

    return type.columns.map((col): ColumnPlan => {
      const override = this.ctx.overrides.get(type.name, col.name);
      if (override.found) {
        return { source: 'value', column: col.name, provide: overrideProvider(override.value) };
      }

      const link = links.get(col.name);
      if (link) {
        return { source: 'link', column: col.name, ...link };
      }

      if (col.nullable && omittedKeys.has(col.name)) {
        return { source: 'value', column: col.name, provide: () => null };
      }

      return { source: 'value', column: col.name, provide: this.ctx.providers.providerFor(type.name, col) };
    });
  }

  private assemble(
    type: EntityType,
    plans: readonly ColumnPlan[],
    single: readonly Wiring[],
    collections: readonly Wiring[]
  ): Factory {
    const { instances, overrides } = this.ctx;
    const name = type.name;
    const primaryKey = type.primaryKey;

    const backfill = (wiring: Wiring, parent: EntityInstance, child: EntityInstance): void => {
      if (wiring.backfill !== undefined && !overrides.has(wiring.relation.target, wiring.backfill)) {
        child[wiring.backfill] = parent[primaryKey];
        instances.link(wiring.relation.target, name);
      }
    };

    const parents = single.filter((wiring) => wiring.relation.type === 'belongsTo');
    const children = single.filter((wiring) => wiring.relation.type !== 'belongsTo');

    const create = (): EntityInstance => {
      const cached = instances.get(name);
      if (cached) {
        return cached;
      }

      // Parents first, so they precede this row in creation order
      const related = new Map<string, EntityInstance>();
      for (const wiring of parents) {
        related.set(wiring.relation.name, wiring.factory());
      }

      const instance: EntityInstance = {};
      for (const plan of plans) {
        instance[plan.column] =
          plan.source === 'link' ? related.get(plan.relation)?.[plan.targetColumn] : plan.provide();
      }
      for (const [relationName, parent] of related) {
        instance[relationName] = parent;
      }
      for (const wiring of children) {
        instance[wiring.relation.name] = null;
      }
      const lists = collections.map((wiring) => {
        const items: EntityInstance[] = [];
        instance[wiring.relation.name] = items;
        return { wiring, items };
      });

      instances.set(name, instance);
      for (const wiring of parents) {
        instances.link(name, wiring.relation.target);
      }

      // Rows holding a foreign key to this one are created after it
      for (const wiring of children) {
        const child = wiring.factory();
        instance[wiring.relation.name] = child;
        backfill(wiring, instance, child);
      }

      // Deferred: only runs when this call created the instance
      for (const { wiring, items } of lists) {
        const child = wiring.factory();
        items.push(child);
        backfill(wiring, instance, child);
      }

      return instance;
    };

    return Object.assign(create, { entity: name });
  }
}
