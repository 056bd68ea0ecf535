/**
 * Standard validation result interface for all schema validators.
 * Ensures consistency across all validateXDetailed functions.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: Array<{
    field: string;
    message: string;
    value: unknown;
  }>;
}
