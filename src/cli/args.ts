/**
 * Command line argument parsing
 *
 * @module cli/args
 * @category CLI
 */

import { ConfigError } from '../errors';

/**
 * Parsed CLI options
 */
export interface CLIOptions {
  config?: string;
  schema?: string;
  samples?: string;
  output?: string;
  seed?: number;
  verbose?: boolean;
}

/**
 * Result of {@link parseArgs}
 */
export interface ParsedArgs {
  command: string;
  options: CLIOptions;
  positional: string[];
}

const NEGATIVE_NUMBER = /^-\d+(\.\d+)?$/;

function requireValue(args: string[], index: number, flag: string, numeric = false): string {
  const value = args[index];
  if (value === undefined || (value.startsWith('-') && !(numeric && NEGATIVE_NUMBER.test(value)))) {
    throw new ConfigError(`Option ${flag} requires a value`);
  }
  return value;
}

/**
 * Parse command line arguments.
 *
 * @example
 * ```typescript
 * parseArgs(['generate', 'job', '--seed', '42']);
 * // => { command: 'generate', options: { seed: 42 }, positional: ['job'] }
 * ```
 */
export function parseArgs(args: string[]): ParsedArgs {
  const options: CLIOptions = {};
  const positional: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!command && !arg.startsWith('-')) {
      command = arg;
      continue;
    }

    if (arg === '--config' || arg === '-c') {
      options.config = requireValue(args, ++i, arg);
    } else if (arg === '--schema' || arg === '-s') {
      options.schema = requireValue(args, ++i, arg);
    } else if (arg === '--samples') {
      options.samples = requireValue(args, ++i, arg);
    } else if (arg === '--output' || arg === '-o') {
      options.output = requireValue(args, ++i, arg);
    } else if (arg === '--seed') {
      const raw = requireValue(args, ++i, arg, true);
      const seed = Number(raw);
      if (!Number.isInteger(seed)) {
        throw new ConfigError(`Option --seed expects an integer, got '${raw}'`);
      }
      options.seed = seed;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (!command && (arg === '--help' || arg === '-h' || arg === '--version' || arg === '-v')) {
      command = arg;
    } else if (arg === '-v') {
      options.verbose = true;
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    } else {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return { command, options, positional };
}
