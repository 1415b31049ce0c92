import { expect } from 'vitest';
import { initializeDatabase } from '../src/server/database.js';
import type { LedgerAssetProvider } from '../src/server/ledger/asset-provider.js';
import { LedgerError, type LedgerErrorCode } from '../src/server/ledger/errors.js';
import { Registry, type RegistryOptions } from '../src/server/ledger/registry.js';
import { NATIVE_ASSET, type Clock } from '../src/server/types/ledger.js';

export const PLATFORM_ADMIN = 'platform-admin';
export const TREASURY = 'platform-treasury';
export const PROJECT_ADMIN = 'project-admin';
export const FIXED_TIME = '2026-01-15T12:00:00.000Z';

export const fixedClock: Clock = {
  now: () => new Date(FIXED_TIME),
};

/** Fresh in-memory database and a registry charging 10% (1000 bps) */
export function setupRegistry(options: RegistryOptions = {}): Registry {
  initializeDatabase(':memory:');
  return new Registry({
    bootstrapAdmin: PLATFORM_ADMIN,
    treasury: TREASURY,
    defaultFeeBps: 1000,
    clock: fixedClock,
    projection: { projectCreated: () => {} },
    ...options,
  });
}

export function ledgerAsset(registry: Registry, assetId: string = NATIVE_ASSET): LedgerAssetProvider {
  const provider = registry.getLedgerAsset(assetId);
  if (!provider) {
    throw new Error(`No ledger-backed provider for ${assetId}`);
  }
  return provider;
}

export function fund(registry: Registry, account: string, amount: bigint, assetId: string = NATIVE_ASSET): void {
  ledgerAsset(registry, assetId).mint(account, amount);
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): LedgerError {
  const error = captureError(fn);
  expect(error).toBeInstanceOf(LedgerError);
  if (!(error instanceof LedgerError)) {
    throw error;
  }
  expect(error.code).toBe(code);
  return error;
}
