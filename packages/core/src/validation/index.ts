export { MEDIA_FIELD_LIMITS } from './limits';
export {
  textLength,
  validateLabel,
  validateLabelSet,
  validateName,
  validateSummary,
  validateByteCount,
} from './field_validator';
export { parsePrincipal, validatePrincipal } from './principal_validator';
export { assertMediaMetadata, assertPrincipal } from './media_validator';
export {
  validateMediaRecordDetailed,
  isMediaRecord,
  validateAccessEntryDetailed,
  isAccessEntry,
  validateSequenceStateDetailed,
  isSequenceState,
  validateHeightStateDetailed,
  isHeightState,
  validateLedgerConfigDetailed,
  isLedgerConfig,
  validateLedgerSessionDetailed,
  isLedgerSession,
} from './record_validator';
export type { ValidationResult } from './errors';
export { DetailedValidationError } from '../record_schemas/errors';
