/**
 * Ajv validation instance with schema validators
 * Every record written to disk must validate against its schema
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { ScanRecordV1, SpotRecordV1 } from '@/types/scan_record';

// Draft 2020-12
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let scanValidator: ValidateFunction<ScanRecordV1> | null = null;
let spotValidator: ValidateFunction<SpotRecordV1> | null = null;

export function getScanValidator(): ValidateFunction<ScanRecordV1> {
  if (!scanValidator) {
    scanValidator = ajv.compile<ScanRecordV1>(loadSchema('scan.v1'));
  }
  return scanValidator;
}

export function getSpotValidator(): ValidateFunction<SpotRecordV1> {
  if (!spotValidator) {
    spotValidator = ajv.compile<SpotRecordV1>(loadSchema('spot.v1'));
  }
  return spotValidator;
}

export type ValidationResult<T> = { valid: true; data: T; errors: null } | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
    'Unknown validation error',
  ];
  return { valid: false, data: null, errors };
}

export function validateScan(data: unknown): ValidationResult<ScanRecordV1> {
  return runValidator(getScanValidator(), data);
}

export function validateSpot(data: unknown): ValidationResult<SpotRecordV1> {
  return runValidator(getSpotValidator(), data);
}
