import type { Principal } from '../types';
import { MEDIA_FIELD_LIMITS } from './limits';

const PRINCIPAL_PATTERN = /^([a-z][a-z0-9]*):([a-z0-9][a-z0-9.-]*)$/;

/**
 * Parses a principal (e.g., 'human:alice') into its components.
 * `_` is never accepted, which keeps filesystem key encoding reversible.
 */
export function parsePrincipal(value: unknown): { kind: string; slug: string } | null {
  if (typeof value !== 'string' || value.length > MEDIA_FIELD_LIMITS.principal.max) return null;
  const match = value.match(PRINCIPAL_PATTERN);
  if (!match || !match[1] || !match[2]) {
    return null;
  }
  return { kind: match[1], slug: match[2] };
}

export function validatePrincipal(value: unknown): value is Principal {
  return parsePrincipal(value) !== null;
}
