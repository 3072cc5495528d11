import type { LedgerDb } from '../db/connection.js';
import type { AssetKind } from '../pools/types.js';
import { bigintToDb, dbToBigint } from '../utils/bigint.js';
import { LedgerError } from '../utils/errors.js';
import type { Custody } from './types.js';

export type TransferRecord = {
  id: number;
  asset: AssetKind;
  from_account: string | null;
  to_account: string | null;
  amount: bigint;
  reason: string;
  created_at: number;
};

/**
 * Custody over the `balances` table of the ledger database. Pool funds sit in
 * the `treasury` account. Writes share the ledger's connection, so they commit
 * or roll back with the operation's transaction.
 */
export class WalletCustody implements Custody {
  constructor(
    private readonly db: LedgerDb,
    readonly treasury: string,
    private readonly clock: () => number,
  ) {}

  balanceOf(asset: AssetKind, account: string): bigint {
    const row = this.db.prepare('SELECT balance FROM balances WHERE asset = ? AND account = ?').get(asset, account) as
      | { balance: string }
      | undefined;
    return row ? dbToBigint(row.balance) : 0n;
  }

  /** Mint `amount` into `account` (funding wallets; not part of the lending flow). */
  credit(asset: AssetKind, account: string, amount: bigint, reason = 'credit'): bigint {
    if (amount <= 0n) throw new LedgerError('ZeroAmount', 'credit must be positive');
    const txn = this.db.transaction(() => {
      const next = this.balanceOf(asset, account) + amount;
      this.write(asset, account, next);
      this.journal(asset, null, account, amount, reason);
      return next;
    });
    return txn();
  }

  transferIn(asset: AssetKind, from: string, amount: bigint, reason: string): void {
    this.move(asset, from, this.treasury, amount, reason);
  }

  transferOut(asset: AssetKind, to: string, amount: bigint, reason: string): void {
    this.move(asset, this.treasury, to, amount, reason);
  }

  history(account: string, limit = 50): TransferRecord[] {
    const rows = this.db.prepare(
      'SELECT * FROM transfers WHERE from_account = ? OR to_account = ? ORDER BY id DESC LIMIT ?',
    ).all(account, account, limit) as (Omit<TransferRecord, 'amount' | 'asset'> & { amount: string; asset: string })[];
    return rows.map((r): TransferRecord => ({ ...r, asset: r.asset === 'A' ? 'A' : 'B', amount: dbToBigint(r.amount) }));
  }

  private move(asset: AssetKind, from: string, to: string, amount: bigint, reason: string): void {
    if (amount <= 0n) throw new LedgerError('ZeroAmount', 'transfer must be positive', { asset, amount });
    const txn = this.db.transaction(() => {
      const src = this.balanceOf(asset, from);
      if (src < amount) {
        throw new LedgerError('InsufficientFunds', `${from} holds ${src} of ${asset}, needs ${amount}`, { asset, account: from, balance: src, amount });
      }
      this.write(asset, from, src - amount);
      this.write(asset, to, this.balanceOf(asset, to) + amount);
      this.journal(asset, from, to, amount, reason);
    });
    txn();
  }

  private write(asset: AssetKind, account: string, balance: bigint): void {
    this.db.prepare(
      'INSERT INTO balances(asset, account, balance, updated_at) VALUES(?, ?, ?, ?) ON CONFLICT(asset, account) DO UPDATE SET balance = excluded.balance, updated_at = excluded.updated_at',
    ).run(asset, account, bigintToDb(balance), this.clock());
  }

  private journal(asset: AssetKind, from: string | null, to: string | null, amount: bigint, reason: string): void {
    this.db.prepare(
      'INSERT INTO transfers(asset, from_account, to_account, amount, reason, created_at) VALUES (?, ?, ?, ?, ?, ?)',
    ).run(asset, from, to, bigintToDb(amount), reason, this.clock());
  }
}
