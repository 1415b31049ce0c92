import {
  getAllowance,
  getBalance,
  setAllowance,
  setBalance,
} from '../database.js';
import type { AssetTransferProvider, Identity } from '../types/ledger.js';

/**
 * Asset accounts kept in the ledger database. Transfers write through the same
 * connection as the registry and projects, so a call that fails after moving
 * funds rolls the movement back with everything else.
 */
export class LedgerAssetProvider implements AssetTransferProvider {
  readonly assetId: string;

  constructor(assetId: string) {
    this.assetId = assetId;
  }

  balanceOf(account: Identity): bigint {
    return getBalance(this.assetId, account);
  }

  allowance(owner: Identity, spender: Identity): bigint {
    return getAllowance(this.assetId, owner, spender);
  }

  approve(owner: Identity, spender: Identity, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`[Asset ${this.assetId}] Allowance cannot be negative`);
    }
    setAllowance(this.assetId, owner, spender, amount);
  }

  /** Credit new units to an account (faucet, test funding) */
  mint(account: Identity, amount: bigint): void {
    if (amount <= 0n) {
      throw new Error(`[Asset ${this.assetId}] Mint amount must be positive`);
    }
    setBalance(this.assetId, account, this.balanceOf(account) + amount);
  }

  transfer(caller: Identity, to: Identity, amount: bigint): boolean {
    return this.move(caller, to, amount);
  }

  transferFrom(spender: Identity, from: Identity, to: Identity, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      return false;
    }
    if (!this.move(from, to, amount)) {
      return false;
    }
    setAllowance(this.assetId, from, spender, allowed - amount);
    return true;
  }

  private move(from: Identity, to: Identity, amount: bigint): boolean {
    if (amount < 0n) return false;
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      return false;
    }
    if (from === to || amount === 0n) return true;
    setBalance(this.assetId, from, fromBalance - amount);
    setBalance(this.assetId, to, this.balanceOf(to) + amount);
    return true;
  }
}
