/**
 * Schema loading utility
 * Schemas ship beside the sources, so lookup is independent of the working directory
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv';

const SCHEMA_DIR = new URL('../../schemas/', import.meta.url);

const schemaCache = new Map<string, SchemaObject>();

export function schemaPath(schemaName: string): string {
  return fileURLToPath(new URL(`${schemaName}.schema.json`, SCHEMA_DIR));
}

export function loadSchema(schemaName: string): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaJson = readFileSync(schemaPath(schemaName), 'utf-8');
  const schema: SchemaObject = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}

export function getRatesPayloadSchema(): SchemaObject {
  return loadSchema('rates_payload.v1');
}
