import type { Identity } from '../types/ledger.js';

export type LedgerErrorCode =
  | 'AlreadyInitialized'
  | 'NotInitialized'
  | 'InvalidAmount'
  | 'InvalidIdentity'
  | 'InvalidReference'
  | 'Unauthorized'
  | 'InvalidStatusTransition'
  | 'GoalNotReached'
  | 'AlreadyReleased'
  | 'AssetNotAllowed'
  | 'NoRecordedDonation'
  | 'TransferFailure'
  | 'UnknownProjectId'
  | 'FeeExceedsCeiling'
  | 'RegistryPaused'
  | 'ReentrantCall'
  | 'TemplateMisconfigured';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      this.details = details;
    }
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

const IDENTITY_PATTERN = /^[A-Za-z0-9:._-]{1,128}$/;
const ZERO_ADDRESS_PATTERN = /^0x0*$/i;

export function assertIdentity(value: unknown, field: string): asserts value is Identity {
  if (typeof value !== 'string' || !IDENTITY_PATTERN.test(value) || ZERO_ADDRESS_PATTERN.test(value)) {
    throw new LedgerError('InvalidIdentity', `${field} is not a valid identity`, { field });
  }
}

export function assertPositiveAmount(value: bigint, field: string): void {
  if (value <= 0n) {
    throw new LedgerError('InvalidAmount', `${field} must be greater than zero`, { field, value: value.toString() });
  }
}
