/**
 * Configuration loader for the graphseed CLI
 *
 * @module cli/config
 * @category CLI
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../errors';
import type { GraphseedConfig } from './types';

// ============================================================================
// Zod Schema for Config Validation
// ============================================================================

/**
 * Zod schema for complete GraphseedConfig validation
 *
 * Uses .strict() to catch typos in config keys
 */
const GraphseedConfigSchema = z.object({
  schema: z.string().min(1, 'schema path is required'),
  samples: z.string().min(1).optional(),
  overrides: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
  foreignKeySuffix: z.string().min(1, 'foreignKeySuffix must not be empty'),
  fakerSeed: z.number().int().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
}).strict();

/**
 * Config file name searched for in the working directory
 */
export const CONFIG_FILE = 'graphseed.config.json';

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: GraphseedConfig = {
  schema: './schema.json',
  foreignKeySuffix: '_id',
  logLevel: 'info',
};

/**
 * Validate configuration object and return typed result
 *
 * @param config - Raw config object to validate (merged over the defaults)
 * @param filePath - Path to config file (for error messages)
 * @throws ConfigError if validation fails with detailed message
 */
export function parseConfig(config: unknown, filePath = CONFIG_FILE): GraphseedConfig {
  const merged = typeof config === 'object' && config !== null && !Array.isArray(config)
    ? { ...DEFAULT_CONFIG, ...config }
    : config;
  const result = GraphseedConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((err) => {
      const path = err.path.join('.');
      return `  - ${path ? `${path}: ` : ''}${err.message}`;
    }).join('\n');

    throw new ConfigError(
      `Invalid configuration in ${filePath}:\n${errors}\n\n` +
      `Common issues:\n` +
      `  - Typos in config keys (e.g., 'shcema' instead of 'schema')\n` +
      `  - overrides must be nested as { table: { column: value } }`
    );
  }

  return result.data;
}

function resolvePaths(config: GraphseedConfig, baseDir: string): GraphseedConfig {
  const toAbsolute = (path: string): string => (isAbsolute(path) ? path : resolve(baseDir, path));
  return {
    ...config,
    schema: toAbsolute(config.schema),
    samples: config.samples === undefined ? undefined : toAbsolute(config.samples),
  };
}

/**
 * Load graphseed configuration from file or return defaults
 *
 * @param configPath - Optional explicit path to config file
 * @returns Loaded configuration merged with defaults, paths made absolute
 *
 * @example
 * ```typescript
 * // Load from default location
 * const config = await loadConfig();
 *
 * // Load from specific path
 * const config = await loadConfig('./fixtures/graphseed.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<GraphseedConfig> {
  const fullPath = resolve(configPath ?? CONFIG_FILE);

  if (!existsSync(fullPath)) {
    // If explicit path provided, it must exist
    if (configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return resolvePaths(getDefaultConfig(), process.cwd());
  }

  const content = await readFile(fullPath, 'utf-8');
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return resolvePaths(parseConfig(rawConfig, fullPath), dirname(fullPath));
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): GraphseedConfig {
  return { ...DEFAULT_CONFIG };
}
