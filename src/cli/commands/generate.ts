/**
 * Generate command for the graphseed CLI
 *
 * Builds the fixture graph of the requested entities and prints it as JSON.
 *
 * @module cli/commands/generate
 * @category CLI
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { faker } from '@faker-js/faker';
import { loadOverrideFile, type OverrideMap } from '../../generator/overrides';
import { createSession } from '../../generator/session';
import { createLogger, type LogLevel, type Logger } from '../../logger';
import { loadSchemaFile } from '../../schema/loader';
import type { EntityInstance } from '../../schema/types';
import { loadConfig } from '../config';
import type { GenerateOptions } from '../types';

/**
 * Output of the generate command
 */
export interface GenerateResult {
  /** Root instance of every requested entity */
  entities: Record<string, EntityInstance>;
  /** Primary key of every materialized row, keyed by table */
  primaryKeys: Record<string, unknown>;
  /** Tables in creation (insertion) order */
  order: string[];
}

/**
 * Logs go to stderr so stdout carries only the JSON document.
 */
function stderrLogger(verbose: boolean | undefined, level: LogLevel): Logger {
  return createLogger({
    level: verbose ? 'debug' : level,
    log: (_level, message, data) => {
      if (data === undefined) {
        console.error(message);
      } else {
        console.error(message, data);
      }
    },
  });
}

/**
 * Main generate command
 *
 * @param options - Generation options
 * @returns The generated document (also written to stdout or `options.output`)
 */
export async function generate(options: GenerateOptions): Promise<GenerateResult> {
  // 1. Load config
  const config = await loadConfig(options.config);
  const logger = stderrLogger(options.verbose, config.logLevel);

  const seed = options.seed ?? config.fakerSeed;
  if (seed !== undefined) {
    faker.seed(seed);
    logger.debug(`Faker seed: ${seed}`);
  }

  // 2. Load schema and overrides
  const schemaPath = options.schema ? resolve(options.schema) : config.schema;
  const schema = await loadSchemaFile(schemaPath);
  logger.info(`Loaded ${schema.size} table(s) from ${schemaPath}`);

  const sources: OverrideMap[] = [];
  const samplesPath = options.samples ? resolve(options.samples) : config.samples;
  if (samplesPath) {
    sources.push(await loadOverrideFile(samplesPath));
    logger.info(`Loaded samples from ${samplesPath}`);
  }
  if (config.overrides) {
    sources.push(config.overrides);
  }

  // 3. Build the graph
  const session = createSession({
    schema,
    overrides: sources,
    logger,
    foreignKeySuffix: config.foreignKeySuffix,
  });

  const requested = options.entities.length > 0 ? options.entities : [...schema.keys()];
  const entities: Record<string, EntityInstance> = {};
  for (const entity of requested) {
    entities[entity] = session.generate(entity);
  }

  const result: GenerateResult = {
    entities,
    primaryKeys: session.primaryKeys(),
    order: session.instances().map(({ entity }) => entity),
  };

  // 4. Write
  const json = JSON.stringify(result, null, 2);
  if (options.output) {
    const outputPath = resolve(options.output);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, json);
    logger.info(`Wrote ${result.order.length} row(s) to ${outputPath}`);
  } else {
    process.stdout.write(`${json}\n`);
  }

  return result;
}
