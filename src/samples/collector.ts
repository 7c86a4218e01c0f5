/**
 * JSON sample collection - representative values for opaque JSON columns
 *
 * Generated JSON columns default to `{}`. Tests that read those columns
 * back usually need realistic structure, so the collector picks one real
 * value per JSON column from an existing data source and writes them as an
 * override file (table → column → value).
 *
 * @module samples/collector
 * @category Samples
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { silentLogger, type Logger } from '../logger';
import type { ColumnDefinition, EntityType } from '../schema/types';
import type { OverrideMap } from '../generator/overrides';

/**
 * Where sample values come from, typically a read-only database client.
 *
 * @example
 * ```typescript
 * const source: SampleSource = {
 *   values: async (table, column) => {
 *     const { rows } = await pool.query(`SELECT "${column}" AS v FROM "${table}" WHERE "${column}" IS NOT NULL LIMIT 50`);
 *     return rows.map((row) => row.v);
 *   },
 * };
 * ```
 */
export interface SampleSource {
  /** Candidate values of a column */
  values(table: string, column: string): Promise<readonly unknown[]>;
}

/**
 * Collected samples keyed by table, then column
 */
export type SampleMap = OverrideMap;

const TRIVIAL_SERIALIZATIONS = new Set(['null', '{}', '[]']);

/**
 * JSON-kind columns of an entity type.
 */
export function jsonColumns(entity: EntityType): ColumnDefinition[] {
  return entity.columns.filter((col) => col.type.kind === 'json');
}

/**
 * Whether a value carries structure worth reusing.
 * `null`, `undefined`, and values serializing to `null`, `{}` or `[]` do not.
 */
export function isInterestingSample(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  return !TRIVIAL_SERIALIZATIONS.has(JSON.stringify(value) ?? 'null');
}

/**
 * Pick the sample for a column: the first interesting value, else the
 * first value that is not null, else `undefined`.
 *
 * @example
 * ```typescript
 * pickSample([null, {}, { retries: 3 }]); // => { retries: 3 }
 * pickSample([null, []]);                 // => []
 * pickSample([null]);                     // => undefined
 * ```
 */
export function pickSample(values: readonly unknown[]): unknown {
  const interesting = values.find(isInterestingSample);
  if (interesting !== undefined) {
    return interesting;
  }
  return values.find(
    (value) => value !== null && value !== undefined && JSON.stringify(value) !== 'null'
  );
}

/**
 * Collect one sample per JSON column of every table.
 * Columns without a usable value and tables without samples are left out.
 *
 * @param source - Where candidate values come from
 * @param tables - Entity types to inspect, e.g. `schema.values()`
 * @param logger - Optional logger
 */
export async function collectSamples(
  source: SampleSource,
  tables: Iterable<EntityType>,
  logger: Logger = silentLogger
): Promise<SampleMap> {
  const samples: SampleMap = {};

  for (const entity of tables) {
    for (const col of jsonColumns(entity)) {
      const sample = pickSample(await source.values(entity.name, col.name));
      if (sample === undefined) {
        logger.debug(`No sample for ${entity.name}.${col.name}`);
        continue;
      }
      const table = samples[entity.name] ?? {};
      table[col.name] = sample;
      samples[entity.name] = table;
    }
  }

  logger.info(`Collected samples for ${Object.keys(samples).length} table(s)`);
  return samples;
}

/**
 * Write samples as a JSON override file, creating parent directories.
 */
export async function writeSampleFile(filePath: string, samples: SampleMap): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(samples, null, 2));
}
