import { MEDIA_FIELD_LIMITS } from './limits';

/**
 * Length of a text in code points, so that a multi-unit character counts once.
 */
export function textLength(text: string): number {
  return [...text].length;
}

function isWithin(text: unknown, min: number, max: number): boolean {
  if (typeof text !== 'string') return false;
  const length = textLength(text);
  return length >= min && length <= max;
}

export function validateLabel(text: unknown): boolean {
  return isWithin(text, MEDIA_FIELD_LIMITS.label.min, MEDIA_FIELD_LIMITS.label.max);
}

/**
 * True iff the list holds 1..10 labels and every label validates.
 */
export function validateLabelSet(labels: unknown): boolean {
  if (!Array.isArray(labels)) return false;
  const { min, max } = MEDIA_FIELD_LIMITS.labelCount;
  if (labels.length < min || labels.length > max) return false;
  return labels.every((label) => validateLabel(label));
}

export function validateName(text: unknown): boolean {
  return isWithin(text, MEDIA_FIELD_LIMITS.name.min, MEDIA_FIELD_LIMITS.name.max);
}

export function validateSummary(text: unknown): boolean {
  return isWithin(text, MEDIA_FIELD_LIMITS.summary.min, MEDIA_FIELD_LIMITS.summary.max);
}

export function validateByteCount(n: unknown): boolean {
  const { exclusiveMin, exclusiveMax } = MEDIA_FIELD_LIMITS.byteCount;
  return typeof n === 'number' && Number.isInteger(n) && n > exclusiveMin && n < exclusiveMax;
}
