import type { LedgerErrorCode, LedgerErrorKind } from '../errors';
import type { IMediaRegistry } from '../media_registry';
import type { Logger } from '../logger';
import type { Height } from '../types';

export type CallError = {
  readonly code: LedgerErrorCode;
  readonly kind: LedgerErrorKind;
  readonly message: string;
};

export type CallResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: CallError };

export const ok = <T>(value: T): CallResult<T> => ({ ok: true, value });

export const err = (error: CallError): CallResult<never> => ({ ok: false, error });

/**
 * Supplies a strictly increasing height for each mutating call.
 */
export interface HeightSource {
  /** Last height issued (0 before the first call) */
  current(): Promise<Height>;
  /** Issues the next height */
  next(): Promise<Height>;
}

/**
 * Exclusive access to the ledger's storage for the duration of `work`.
 */
export interface LedgerLock {
  withLock<T>(work: () => Promise<T>): Promise<T>;
}

export interface LedgerHostDependencies {
  registry: IMediaRegistry;
  heights: HeightSource;
  /** Held around every call, height draw included (default: none) */
  lock?: LedgerLock;
  logger?: Logger;
}
