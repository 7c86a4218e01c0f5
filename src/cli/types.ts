/**
 * CLI type definitions
 *
 * @module cli/types
 * @category CLI
 */

import type { LogLevel } from '../logger';
import type { OverrideMap } from '../generator/overrides';

/**
 * Main graphseed configuration (`graphseed.config.json`).
 *
 * Relative paths are resolved against the directory of the config file.
 *
 * @example
 * ```json
 * {
 *   "schema": "./fixtures/schema.json",
 *   "samples": "./fixtures/json_samples.json",
 *   "overrides": { "job": { "status": "RUNNING" } },
 *   "fakerSeed": 42
 * }
 * ```
 */
export interface GraphseedConfig {
  /** Path to the JSON schema document */
  schema: string;
  /** Path to a JSON sample/override file, applied before `overrides` */
  samples?: string;
  /** Literal overrides, table → column → value */
  overrides?: OverrideMap;
  /** Suffix marking foreign-key columns for relation inference */
  foreignKeySuffix: string;
  /** Faker seed for reproducible data */
  fakerSeed?: number;
  /** Minimum log level */
  logLevel: LogLevel;
}

/**
 * Options accepted by the `generate` command
 */
export interface GenerateOptions {
  /** Entity names to generate */
  entities: string[];
  config?: string;
  schema?: string;
  samples?: string;
  output?: string;
  seed?: number;
  verbose?: boolean;
}
