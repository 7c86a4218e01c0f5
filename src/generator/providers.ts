/**
 * Synthetic value providers - maps column types to Faker.js strategies
 *
 * @module generator/providers
 * @category Generator
 */

import { faker } from '@faker-js/faker';
import { MissingProviderError } from '../errors';
import { COLUMN_KINDS, type ColumnDefinition, type ColumnKind, type ColumnType } from '../schema/types';

/**
 * Produces one value per call.
 */
export type ValueProvider = () => unknown;

/**
 * Builds a provider for a column whose type has kind `K`.
 */
export type ProviderFactory<K extends ColumnKind = ColumnKind> = (
  type: Extract<ColumnType, { kind: K }>,
  column: ColumnDefinition
) => ValueProvider;

/**
 * One provider factory per column kind. Omitting a kind is a compile error.
 */
export type ProviderTable = { [K in ColumnKind]: ProviderFactory<K> };

/**
 * Length of generated strings when the column declares none.
 */
export const DEFAULT_STRING_LENGTH = 36;

function startOfMonth(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), 1);
}

/**
 * Default strategies.
 */
export const defaultProviders: ProviderTable = {
  string: (type, column) => {
    if (column.primaryKey) {
      return () => faker.string.uuid();
    }
    const length = type.length ?? DEFAULT_STRING_LENGTH;
    return () => faker.string.alphanumeric(length);
  },
  integer: () => () => faker.number.int({ min: 0, max: 9999 }),
  float: () => () => faker.number.float({ min: 0, max: 1000, fractionDigits: 2 }),
  boolean: () => () => faker.datatype.boolean(),
  timestamp: () => () => {
    const now = new Date();
    return faker.date.between({ from: startOfMonth(now), to: now });
  },
  enum: (type) => () => faker.helpers.arrayElement(type.values),
  json: () => () => ({}),
  uuid: () => () => faker.string.uuid(),
};

function isKind<K extends ColumnKind>(type: ColumnType, kind: K): type is Extract<ColumnType, { kind: K }> {
  return type.kind === kind;
}

type BoundFactory = (column: ColumnDefinition) => ValueProvider | undefined;

/**
 * Registry of value providers keyed by column kind.
 *
 * @example
 * ```typescript
 * const providers = new ProviderRegistry();
 *
 * // Generate a value for a column
 * const next = providers.providerFor('job', statusColumn);
 * next(); // => 'RUNNING'
 *
 * // Replace a strategy
 * providers.registerProvider('integer', () => () => 42);
 * ```
 */
export class ProviderRegistry {
  private providers = new Map<string, BoundFactory>();

  constructor(table: ProviderTable = defaultProviders) {
    for (const kind of COLUMN_KINDS) {
      this.install(table, kind);
    }
  }

  /**
   * Replace the strategy for a column kind.
   */
  registerProvider<K extends ColumnKind>(kind: K, factory: ProviderFactory<K>): void {
    this.providers.set(kind, (column) => {
      const type = column.type;
      return isKind(type, kind) ? factory(type, column) : undefined;
    });
  }

  /**
   * Get a provider for a column.
   *
   * @param entity - Owning table, used in error messages
   * @throws MissingProviderError if no strategy exists for the column's kind,
   *   or the column is an enum without values
   */
  providerFor(entity: string, column: ColumnDefinition): ValueProvider {
    const type = column.type;
    if (type.kind === 'enum' && type.values.length === 0) {
      throw new MissingProviderError(entity, column.name, 'enum without values');
    }
    const provider = this.providers.get(type.kind)?.(column);
    if (!provider) {
      throw new MissingProviderError(entity, column.name, String(type.kind));
    }
    return provider;
  }

  private install<K extends ColumnKind>(table: ProviderTable, kind: K): void {
    this.registerProvider(kind, table[kind]);
  }
}
