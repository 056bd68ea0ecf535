/**
 * Base class for all MediaLedger-specific errors.
 * Centralized here as it's used across multiple modules (schemas, validation, registry, etc.)
 */
export class MediaLedgerError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Identity of a caller or owner (e.g., 'human:alice', 'agent:uploader').
 */
export type Principal = string;

/**
 * Sequence-assigned identifier of a media record.
 */
export type RecordId = number;

/**
 * Height value supplied by the execution environment for each call.
 */
export type Height = number;

/**
 * Per-call context supplied by the execution environment.
 */
export type CallContext = {
  caller: Principal;
  height: Height;
};
