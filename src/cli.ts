#!/usr/bin/env node
/**
 * graphseed CLI - generate fixture graphs from a schema document
 *
 * @module cli
 * @category CLI
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseArgs } from './cli/args';

/**
 * Display help information.
 */
function showHelp(): void {
  console.log(`
graphseed - schema-consistent fixture graphs for relational models

Usage:
  graphseed <command> [options]

Commands:
  generate [entity...]             Generate the fixture graph of each entity
                                   (all tables when none are given)
  help                             Show this help message
  version                          Show version

Generate Options:
  --config, -c <file>     Config file path (default: ./graphseed.config.json)
  --schema, -s <file>     Schema document, overrides config.schema
  --samples <file>        JSON sample/override file, overrides config.samples
  --output, -o <file>     Write JSON to a file instead of stdout
  --seed <n>              Faker seed for reproducible output
  --verbose, -v           Verbose output (on stderr)

Examples:
  graphseed generate job
  graphseed generate job pipeline --seed 42 --output ./fixtures/graph.json
  graphseed generate --schema ./schema.json --samples ./json_samples.json
`);
}

/**
 * Display version information.
 */
function showVersion(): void {
  const pkgPath = resolve(__dirname, '../package.json');
  if (existsSync(pkgPath)) {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      console.log(`graphseed v${pkg.version}`);
      return;
    }
  }
  console.log('graphseed v0.1.0');
}

/**
 * Main CLI entry point.
 */
async function main(): Promise<void> {
  const { command, options, positional } = parseArgs(process.argv.slice(2));

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
    case '':
      showHelp();
      break;

    case 'version':
    case '--version':
    case '-v':
      showVersion();
      break;

    case 'generate': {
      const { generate } = await import('./cli/commands/generate');
      await generate({ ...options, entities: positional });
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.log('Run "graphseed help" for usage information.');
      process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(1);
});
