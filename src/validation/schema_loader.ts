/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv';

export type SchemaName = 'env.v1' | 'universe.v1' | 'benchmarks.v1' | 'macro_context.v1';

const schemaCache = new Map<SchemaName, SchemaObject>();

const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

export function getSchemaDirectory(): string {
  return SCHEMA_DIR;
}

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(getSchemaDirectory(), `${schemaName}.schema.json`);
  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
