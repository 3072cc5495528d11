import type { AssetKind } from '../pools/types.js';

/**
 * Moves assets between callers and the ledger's treasury. Implementations
 * throw `LedgerError('InsufficientFunds')` when a transfer cannot be covered.
 */
export interface Custody {
  balanceOf(asset: AssetKind, account: string): bigint;
  transferIn(asset: AssetKind, from: string, amount: bigint, reason: string): void;
  transferOut(asset: AssetKind, to: string, amount: bigint, reason: string): void;
}
