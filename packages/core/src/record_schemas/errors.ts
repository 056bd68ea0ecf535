/**
 * Schema-specific error types for MediaLedger core.
 * These errors are thrown when a stored value fails its JSON Schema.
 */

import { MediaLedgerError } from '../types/common.types';

/**
 * Error for detailed AJV validation failures with multiple field errors.
 */
export class DetailedValidationError extends MediaLedgerError {
  constructor(
    recordType: string,
    public readonly errors: Array<{
      field: string;
      message: string;
      value: unknown;
    }>
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(
      `${recordType} validation failed: ${errorSummary}`,
      'DETAILED_VALIDATION_ERROR'
    );
  }
}
