/**
 * Ajv validation instance with schema validators
 * Provider responses and the fallback snapshot both pass through here
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getRatesPayloadSchema } from './schema_loader';
import type { RatesPayload } from '@/fx/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, uri, ...)
addFormats(ajv);

let ratesPayloadValidator: ValidateFunction<RatesPayload> | null = null;

export function getRatesPayloadValidator(): ValidateFunction<RatesPayload> {
  if (!ratesPayloadValidator) {
    ratesPayloadValidator = ajv.compile<RatesPayload>(getRatesPayloadSchema());
  }
  return ratesPayloadValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

export function validateRatesPayload(
  data: unknown,
  validate: ValidateFunction<RatesPayload> = getRatesPayloadValidator()
): ValidationResult<RatesPayload> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
