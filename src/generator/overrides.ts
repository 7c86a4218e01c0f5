/**
 * Override Table - caller-supplied fixed values per (table, column)
 *
 * @module generator/overrides
 * @category Generator
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors';
import type { ValueProvider } from './providers';

/**
 * Overrides keyed by table name, then column name.
 * A function value is a provider, called once per generated instance;
 * anything else is used as-is.
 *
 * @example
 * ```typescript
 * const overrides: OverrideMap = {
 *   job: { status: 'RUNNING' },
 *   pipeline: { name: () => `pipeline-${Date.now()}` },
 * };
 * ```
 */
export type OverrideMap = Record<string, Record<string, unknown>>;

/**
 * Lookup result, distinguishing "no override" from an override of `undefined`.
 */
export type OverrideLookup =
  | { found: true; value: unknown }
  | { found: false };

const OverrideFileSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/**
 * Merged, read-only view over several override sources.
 *
 * @example
 * ```typescript
 * const samples = await loadOverrideFile('./json_samples.json');
 * const overrides = new OverrideTable(samples, { job: { status: 'RUNNING' } });
 * overrides.get('job', 'status'); // => { found: true, value: 'RUNNING' }
 * ```
 */
export class OverrideTable {
  private readonly entities = new Map<string, ReadonlyMap<string, unknown>>();

  /**
   * @param sources - Merged per column in order; later sources win
   */
  constructor(...sources: OverrideMap[]) {
    const merged = new Map<string, Map<string, unknown>>();
    for (const source of sources) {
      for (const [entity, columns] of Object.entries(source)) {
        const target = merged.get(entity) ?? new Map<string, unknown>();
        for (const [columnName, value] of Object.entries(columns)) {
          target.set(columnName, value);
        }
        merged.set(entity, target);
      }
    }
    for (const [entity, columns] of merged) {
      this.entities.set(entity, columns);
    }
  }

  /**
   * Look up the override for a column.
   */
  get(entity: string, columnName: string): OverrideLookup {
    const columns = this.entities.get(entity);
    if (!columns || !columns.has(columnName)) {
      return { found: false };
    }
    return { found: true, value: columns.get(columnName) };
  }

  /**
   * Whether an override exists. Falsy values such as `null` or `0` count.
   */
  has(entity: string, columnName: string): boolean {
    return this.entities.get(entity)?.has(columnName) ?? false;
  }

  /**
   * All entries as `[table, column, value]` triples.
   */
  entries(): Array<[string, string, unknown]> {
    const result: Array<[string, string, unknown]> = [];
    for (const [entity, columns] of this.entities) {
      for (const [columnName, value] of columns) {
        result.push([entity, columnName, value]);
      }
    }
    return result;
  }
}

/**
 * Turn an override value into a provider.
 */
export function overrideProvider(value: unknown): ValueProvider {
  if (typeof value === 'function') {
    return () => value();
  }
  return () => value;
}

/**
 * Validate an override document (table → column → value).
 *
 * @throws ConfigError if the document is not a two-level object
 */
export function parseOverrides(document: unknown, source = 'overrides'): OverrideMap {
  const result = OverrideFileSchema.safeParse(document);
  if (!result.success) {
    const errors = result.error.errors.map((err) => {
      const path = err.path.join('.');
      return `  - ${path ? `${path}: ` : ''}${err.message}`;
    }).join('\n');
    throw new ConfigError(`Invalid overrides in ${source}:\n${errors}`);
  }
  return result.data;
}

/**
 * Read a JSON override file, such as the sample file written by
 * {@link writeSampleFile}.
 */
export async function loadOverrideFile(filePath: string): Promise<OverrideMap> {
  const content = await readFile(filePath, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse override file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseOverrides(document, filePath);
}
