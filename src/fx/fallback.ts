import { readFileSync } from 'fs';
import { validateRatesPayload } from '@/validation/ajv_instance';
import { FallbackUnreadableError } from './errors';
import type { RatesPayload } from './types';

/**
 * Reads the bundled snapshot verbatim. Any failure is fatal: there is
 * nothing beneath the snapshot to fall back to.
 */
export function loadFallbackSnapshot(path: string): RatesPayload {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new FallbackUnreadableError(path, 'file could not be read', error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FallbackUnreadableError(path, 'invalid JSON', error);
  }

  const result = validateRatesPayload(parsed);
  if (!result.valid) {
    throw new FallbackUnreadableError(path, result.errors.join('; '));
  }
  return result.data;
}
