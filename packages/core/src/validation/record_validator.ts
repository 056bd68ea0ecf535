import type { ErrorObject, SchemaObject } from "ajv";
import type { AccessEntry, HeightState, MediaRecord, SequenceState } from '../types';
import type { ValidationResult } from './errors';
import type { LedgerConfig } from '../config_manager/config_manager.types';
import type { LedgerSession } from '../session_manager/session_manager.types';
import { SchemaValidationCache } from '../record_schemas/schema_cache';
import { Schemas } from '../record_schemas';

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationResult['errors'] {
  return (errors || []).map((error: ErrorObject) => ({
    field: error.instancePath?.replace('/', '') || error.params?.['missingProperty'] || 'root',
    message: error.message || 'Unknown validation error',
    value: error.data
  }));
}

function validateDetailed(schema: SchemaObject, data: unknown): ValidationResult {
  const validator = SchemaValidationCache.getValidatorFromSchema(schema);
  const isValid = validator(data);

  if (!isValid) {
    return {
      isValid: false,
      errors: formatErrors(validator.errors)
    };
  }

  return {
    isValid: true,
    errors: []
  };
}

/**
 * Detailed validation of a stored MediaRecord with field-level error reporting
 */
export function validateMediaRecordDetailed(data: unknown): ValidationResult {
  return validateDetailed(Schemas.MediaRecord, data);
}

/**
 * Type guard to check if data is a valid MediaRecord
 */
export function isMediaRecord(data: unknown): data is MediaRecord {
  return validateMediaRecordDetailed(data).isValid;
}

export function validateAccessEntryDetailed(data: unknown): ValidationResult {
  return validateDetailed(Schemas.AccessEntry, data);
}

export function isAccessEntry(data: unknown): data is AccessEntry {
  return validateAccessEntryDetailed(data).isValid;
}

export function validateSequenceStateDetailed(data: unknown): ValidationResult {
  return validateDetailed(Schemas.SequenceState, data);
}

export function isSequenceState(data: unknown): data is SequenceState {
  return validateSequenceStateDetailed(data).isValid;
}

export function validateHeightStateDetailed(data: unknown): ValidationResult {
  return validateDetailed(Schemas.HeightState, data);
}

export function isHeightState(data: unknown): data is HeightState {
  return validateHeightStateDetailed(data).isValid;
}

export function validateLedgerConfigDetailed(data: unknown): ValidationResult {
  return validateDetailed(Schemas.LedgerConfig, data);
}

export function isLedgerConfig(data: unknown): data is LedgerConfig {
  return validateLedgerConfigDetailed(data).isValid;
}

export function validateLedgerSessionDetailed(data: unknown): ValidationResult {
  return validateDetailed(Schemas.LedgerSession, data);
}

export function isLedgerSession(data: unknown): data is LedgerSession {
  return validateLedgerSessionDetailed(data).isValid;
}
