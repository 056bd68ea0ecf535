/**
 * Field bounds for media records. Lengths are counted in code points.
 */
export const MEDIA_FIELD_LIMITS = {
  name: { min: 1, max: 64 },
  summary: { min: 1, max: 128 },
  label: { min: 1, max: 32 },
  labelCount: { min: 1, max: 10 },
  /** Exclusive bounds: 0 < byteCount < 1_000_000_000 */
  byteCount: { exclusiveMin: 0, exclusiveMax: 1_000_000_000 },
  principal: { max: 128 },
} as const;
