import type { LedgerDb } from '../db/connection.js';
import { bigintToDb, dbToBigint } from '../utils/bigint.js';
import type { Loan } from './types.js';

type LoanRow = {
  pool_id: string;
  principal: string;
  collateral_amount: string;
  borrowed_amount: string;
  repay_amount: string;
  interest_amount: string;
  fee_amount: string;
  start_time: number;
  duration: number;
};

function toLoan(row: LoanRow): Loan {
  return {
    pool_id: row.pool_id,
    principal: row.principal,
    collateralAmount: dbToBigint(row.collateral_amount),
    borrowedAmount: dbToBigint(row.borrowed_amount),
    repayAmount: dbToBigint(row.repay_amount),
    interestAmount: dbToBigint(row.interest_amount),
    feeAmount: dbToBigint(row.fee_amount),
    startTime: Number(row.start_time),
    duration: Number(row.duration),
  };
}

/**
 * Loans per (pool, principal). Closing a loan deletes its row, which reads
 * back the same as a record with every field zeroed.
 */
export class LoanLedger {
  constructor(private readonly db: LedgerDb) {}

  get(poolId: string, principal: string): Loan | null {
    const row = this.db.prepare('SELECT * FROM loans WHERE pool_id = ? AND principal = ?').get(poolId, principal) as LoanRow | undefined;
    return row ? toLoan(row) : null;
  }

  list(poolId: string): Loan[] {
    const rows = this.db.prepare('SELECT * FROM loans WHERE pool_id = ? ORDER BY start_time ASC, principal ASC').all(poolId) as LoanRow[];
    return rows.map(toLoan);
  }

  /** Loans whose term ended at or before `now`. */
  listLiquidatable(poolId: string, now: number): Loan[] {
    const rows = this.db.prepare('SELECT * FROM loans WHERE pool_id = ? AND start_time + duration <= ? ORDER BY start_time ASC')
      .all(poolId, now) as LoanRow[];
    return rows.map(toLoan).filter((l) => l.collateralAmount > 0n);
  }

  insert(loan: Loan): void {
    this.db.prepare(`
      INSERT INTO loans(pool_id, principal, collateral_amount, borrowed_amount, repay_amount, interest_amount, fee_amount, start_time, duration)
      VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      loan.pool_id,
      loan.principal,
      bigintToDb(loan.collateralAmount),
      bigintToDb(loan.borrowedAmount),
      bigintToDb(loan.repayAmount),
      bigintToDb(loan.interestAmount),
      bigintToDb(loan.feeAmount),
      loan.startTime,
      loan.duration,
    );
  }

  setRepayAmount(poolId: string, principal: string, repayAmount: bigint): void {
    this.db.prepare('UPDATE loans SET repay_amount = ? WHERE pool_id = ? AND principal = ?')
      .run(bigintToDb(repayAmount), poolId, principal);
  }

  close(poolId: string, principal: string): void {
    this.db.prepare('DELETE FROM loans WHERE pool_id = ? AND principal = ?').run(poolId, principal);
  }
}
