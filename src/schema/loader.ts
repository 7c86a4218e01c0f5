/**
 * Loads schema descriptions from JSON documents.
 *
 * A schema document lists tables with their columns and declared relations:
 *
 * ```json
 * {
 *   "tables": [
 *     {
 *       "name": "job",
 *       "columns": [
 *         { "name": "id", "type": "uuid", "primaryKey": true },
 *         { "name": "status", "type": "enum", "values": ["PENDING", "RUNNING"] },
 *         { "name": "pipeline_id", "type": "uuid", "references": [{ "table": "pipeline" }] }
 *       ]
 *     }
 *   ]
 * }
 * ```
 *
 * @module schema/loader
 * @category Schema
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { SchemaError } from '../errors';
import { createEntityType, defineSchema } from './define-table';
import type { ColumnDefinition, ColumnType, SchemaMap } from './types';

// ============================================================================
// Zod Schema for Schema Documents
// ============================================================================

const ReferenceSchema = z.object({
  table: z.string().min(1),
  column: z.string().min(1).default('id'),
}).strict();

const ColumnBase = {
  name: z.string().min(1),
  primaryKey: z.boolean().default(false),
  nullable: z.boolean().default(false),
  references: z.array(ReferenceSchema).default([]),
};

const ColumnSchema = z.discriminatedUnion('type', [
  z.object({ ...ColumnBase, type: z.literal('string'), length: z.number().int().positive().optional() }).strict(),
  z.object({ ...ColumnBase, type: z.literal('integer') }).strict(),
  z.object({ ...ColumnBase, type: z.literal('float') }).strict(),
  z.object({ ...ColumnBase, type: z.literal('boolean') }).strict(),
  z.object({ ...ColumnBase, type: z.literal('timestamp') }).strict(),
  z.object({ ...ColumnBase, type: z.literal('enum'), values: z.array(z.string()).min(1) }).strict(),
  z.object({ ...ColumnBase, type: z.literal('json') }).strict(),
  z.object({ ...ColumnBase, type: z.literal('uuid') }).strict(),
]);

const RelationSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['belongsTo', 'hasOne', 'hasMany']),
  target: z.string().min(1),
  foreignKey: z.string().min(1).optional(),
}).strict();

const TableSchema = z.object({
  name: z.string().min(1),
  primaryKey: z.string().min(1).optional(),
  columns: z.array(ColumnSchema).min(1),
  relations: z.array(RelationSchema).default([]),
}).strict();

const SchemaDocumentSchema = z.object({
  tables: z.array(TableSchema),
}).strict();

type ColumnInput = z.infer<typeof ColumnSchema>;

function toColumnType(input: ColumnInput): ColumnType {
  switch (input.type) {
    case 'string':
      return input.length === undefined ? { kind: 'string' } : { kind: 'string', length: input.length };
    case 'integer':
      return { kind: 'integer' };
    case 'float':
      return { kind: 'float' };
    case 'boolean':
      return { kind: 'boolean' };
    case 'timestamp':
      return { kind: 'timestamp' };
    case 'enum':
      return { kind: 'enum', values: input.values };
    case 'json':
      return { kind: 'json' };
    case 'uuid':
      return { kind: 'uuid' };
  }
}

function toColumnDefinition(input: ColumnInput): ColumnDefinition {
  return {
    name: input.name,
    type: toColumnType(input),
    primaryKey: input.primaryKey,
    nullable: input.nullable,
    foreignKeys: input.references,
  };
}

/**
 * Validate a parsed schema document and build the schema map.
 *
 * @param document - Parsed JSON
 * @param source - Name used in error messages
 * @throws SchemaError listing every validation issue
 */
export function parseSchema(document: unknown, source = 'schema'): SchemaMap {
  const result = SchemaDocumentSchema.safeParse(document);

  if (!result.success) {
    const errors = result.error.errors.map((err) => {
      const path = err.path.join('.');
      return `  - ${path ? `${path}: ` : ''}${err.message}`;
    }).join('\n');

    throw new SchemaError(`Invalid schema in ${source}:\n${errors}`);
  }

  return defineSchema(
    result.data.tables.map((table) =>
      createEntityType({
        name: table.name,
        primaryKey: table.primaryKey,
        columns: table.columns.map(toColumnDefinition),
        relations: table.relations,
      })
    )
  );
}

/**
 * Read and parse a JSON schema file.
 *
 * @example
 * ```typescript
 * const schema = await loadSchemaFile('./fixtures/schema.json');
 * const session = createSession({ schema });
 * ```
 */
export async function loadSchemaFile(filePath: string): Promise<SchemaMap> {
  const content = await readFile(filePath, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new SchemaError(`Failed to parse schema file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseSchema(document, filePath);
}
