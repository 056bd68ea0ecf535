import type { MediaMetadata, Principal } from '../types';
import {
  InvalidNameError,
  InvalidPrincipalError,
  InvalidSizeError,
  MalformedLabelError,
} from '../errors';
import { MEDIA_FIELD_LIMITS } from './limits';
import {
  textLength,
  validateByteCount,
  validateLabel,
  validateName,
  validateSummary,
} from './field_validator';
import { validatePrincipal } from './principal_validator';

function describeLabelSet(labels: unknown): string | null {
  if (!Array.isArray(labels)) {
    return 'labels must be a list';
  }
  const { min, max } = MEDIA_FIELD_LIMITS.labelCount;
  if (labels.length < min || labels.length > max) {
    return `expected ${min} to ${max} labels, got ${labels.length}`;
  }
  const index = labels.findIndex((label) => !validateLabel(label));
  if (index === -1) return null;
  const label: unknown = labels[index];
  const length = typeof label === 'string' ? textLength(label) : 'non-text';
  return `label ${index} must be ${MEDIA_FIELD_LIMITS.label.min} to ${MEDIA_FIELD_LIMITS.label.max} characters (got ${length})`;
}

/**
 * Runs the ordered field assertions: name, byteCount, summary, labels.
 * Throws the error of the first violated constraint.
 */
export function assertMediaMetadata(metadata: MediaMetadata): void {
  if (!validateName(metadata.name)) {
    throw new InvalidNameError('name', String(metadata.name));
  }
  if (!validateByteCount(metadata.byteCount)) {
    throw new InvalidSizeError(metadata.byteCount);
  }
  if (!validateSummary(metadata.summary)) {
    // Summary shares the invalid-name kind
    throw new InvalidNameError('summary', String(metadata.summary));
  }
  const labelProblem = describeLabelSet(metadata.labels);
  if (labelProblem) {
    throw new MalformedLabelError(labelProblem);
  }
}

export function assertPrincipal(value: string): Principal {
  if (!validatePrincipal(value)) {
    throw new InvalidPrincipalError(value);
  }
  return value;
}
