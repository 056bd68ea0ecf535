import {
  textLength,
  validateLabel,
  validateLabelSet,
  validateName,
  validateSummary,
  validateByteCount,
} from './field_validator';
import { parsePrincipal, validatePrincipal } from './principal_validator';

describe('Field Validators', () => {
  describe('validateLabel', () => {
    it('[EARS-1] should accept labels of 1 to 32 characters', () => {
      expect(validateLabel('v')).toBe(true);
      expect(validateLabel('x'.repeat(32))).toBe(true);
    });

    it('[EARS-2] should reject empty and oversized labels', () => {
      expect(validateLabel('')).toBe(false);
      expect(validateLabel('x'.repeat(33))).toBe(false);
    });

    it('[EARS-3] should reject non-text values', () => {
      expect(validateLabel(42)).toBe(false);
      expect(validateLabel(null)).toBe(false);
    });
  });

  describe('validateLabelSet', () => {
    it('[EARS-4] should accept 1 to 10 valid labels', () => {
      expect(validateLabelSet(['video'])).toBe(true);
      expect(validateLabelSet(Array.from({ length: 10 }, () => 'x'.repeat(32)))).toBe(true);
    });

    it('[EARS-5] should reject an empty list', () => {
      expect(validateLabelSet([])).toBe(false);
    });

    it('[EARS-6] should reject more than 10 labels', () => {
      expect(validateLabelSet(Array.from({ length: 11 }, (_, i) => `tag-${i}`))).toBe(false);
    });

    it('[EARS-7] should reject a list holding one invalid label', () => {
      expect(validateLabelSet(['video', ''])).toBe(false);
      expect(validateLabelSet(['video', 'x'.repeat(33)])).toBe(false);
    });

    it('[EARS-8] should reject values that are not lists', () => {
      expect(validateLabelSet('video')).toBe(false);
    });
  });

  describe('validateName / validateSummary', () => {
    it('[EARS-9] should accept names of 1 to 64 characters', () => {
      expect(validateName('clip.mp4')).toBe(true);
      expect(validateName('n'.repeat(64))).toBe(true);
    });

    it('[EARS-10] should reject empty names and names of 65 characters', () => {
      expect(validateName('')).toBe(false);
      expect(validateName('n'.repeat(65))).toBe(false);
    });

    it('[EARS-11] should accept summaries of 1 to 128 characters', () => {
      expect(validateSummary('demo')).toBe(true);
      expect(validateSummary('s'.repeat(128))).toBe(true);
      expect(validateSummary('s'.repeat(129))).toBe(false);
      expect(validateSummary('')).toBe(false);
    });

    it('[EARS-12] should count code points rather than UTF-16 units', () => {
      const emoji = '\u{1F3AC}';
      expect(emoji.length).toBe(2);
      expect(textLength(emoji)).toBe(1);
      expect(validateName(emoji.repeat(64))).toBe(true);
      expect(validateName(emoji.repeat(65))).toBe(false);
    });
  });

  describe('validateByteCount', () => {
    it('[EARS-13] should accept sizes strictly between 0 and 1_000_000_000', () => {
      expect(validateByteCount(1)).toBe(true);
      expect(validateByteCount(1024)).toBe(true);
      expect(validateByteCount(999_999_999)).toBe(true);
    });

    it('[EARS-14] should reject 0, 1_000_000_000 and beyond', () => {
      expect(validateByteCount(0)).toBe(false);
      expect(validateByteCount(1_000_000_000)).toBe(false);
      expect(validateByteCount(5_000_000_000)).toBe(false);
    });

    it('[EARS-15] should reject negative, fractional and non-numeric sizes', () => {
      expect(validateByteCount(-1)).toBe(false);
      expect(validateByteCount(10.5)).toBe(false);
      expect(validateByteCount(Number.NaN)).toBe(false);
      expect(validateByteCount('1024')).toBe(false);
    });
  });

  describe('validatePrincipal', () => {
    it('[EARS-16] should parse kind and slug', () => {
      expect(parsePrincipal('human:alice')).toEqual({ kind: 'human', slug: 'alice' });
      expect(parsePrincipal('agent:uploader.v2')).toEqual({ kind: 'agent', slug: 'uploader.v2' });
    });

    it('[EARS-17] should reject malformed principals', () => {
      expect(validatePrincipal('alice')).toBe(false);
      expect(validatePrincipal('human:')).toBe(false);
      expect(validatePrincipal('Human:alice')).toBe(false);
      expect(validatePrincipal('human:alice_smith')).toBe(false);
      expect(validatePrincipal(`human:${'a'.repeat(123)}`)).toBe(false);
      expect(validatePrincipal(7)).toBe(false);
    });
  });
});
