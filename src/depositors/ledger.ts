import type { LedgerDb } from '../db/connection.js';
import { bigintToDb, dbToBigint } from '../utils/bigint.js';

export type Depositor = {
  pool_id: string;
  principal: string;
  shareBalance: bigint;
};

/** Share balances per (pool, principal). A row exists only while shares are held. */
export class DepositorLedger {
  constructor(private readonly db: LedgerDb) {}

  shareBalance(poolId: string, principal: string): bigint {
    const row = this.db.prepare('SELECT share_balance FROM depositors WHERE pool_id = ? AND principal = ?')
      .get(poolId, principal) as { share_balance: string } | undefined;
    return row ? dbToBigint(row.share_balance) : 0n;
  }

  credit(poolId: string, principal: string, shares: bigint, now: number): bigint {
    const next = this.shareBalance(poolId, principal) + shares;
    this.db.prepare(`
      INSERT INTO depositors(pool_id, principal, share_balance, updated_at) VALUES(?, ?, ?, ?)
      ON CONFLICT(pool_id, principal) DO UPDATE SET share_balance = excluded.share_balance, updated_at = excluded.updated_at
    `).run(poolId, principal, bigintToDb(next), now);
    return next;
  }

  remove(poolId: string, principal: string): void {
    this.db.prepare('DELETE FROM depositors WHERE pool_id = ? AND principal = ?').run(poolId, principal);
  }

  list(poolId: string): Depositor[] {
    const rows = this.db.prepare('SELECT pool_id, principal, share_balance FROM depositors WHERE pool_id = ? ORDER BY principal ASC')
      .all(poolId) as { pool_id: string; principal: string; share_balance: string }[];
    return rows.map((r) => ({ pool_id: r.pool_id, principal: r.principal, shareBalance: dbToBigint(r.share_balance) }));
  }
}
