import type { LedgerDb } from '../db/connection.js';
import { bigintToDb, dbToBigint } from '../utils/bigint.js';
import { LedgerError } from '../utils/errors.js';
import { ORIENTATIONS, type NewPool, type Orientation, type Pool, type PoolParams, type PoolTotals } from './types.js';

type PoolRow = {
  id: string;
  orientation: string;
  interest_rate: number;
  reserve_fee_rate: number;
  collateral_factor: number;
  total_borrow_amount: string;
  total_asset_amount: string;
  total_reserve_amount: string;
  current_balance_amount: string;
  created_at: number;
  updated_at: number;
};

function toOrientation(v: string): Orientation {
  const o = ORIENTATIONS.find((x) => x === v);
  if (!o) throw new LedgerError('InvariantViolation', `unknown pool orientation '${v}'`);
  return o;
}

function toPool(row: PoolRow): Pool {
  return {
    id: row.id,
    orientation: toOrientation(row.orientation),
    params: {
      interestRate: Number(row.interest_rate),
      reserveFeeRate: Number(row.reserve_fee_rate),
      collateralFactor: Number(row.collateral_factor),
    },
    totalBorrowAmount: dbToBigint(row.total_borrow_amount),
    totalAssetAmount: dbToBigint(row.total_asset_amount),
    totalReserveAmount: dbToBigint(row.total_reserve_amount),
    currentBalanceAmount: dbToBigint(row.current_balance_amount),
    created_at: Number(row.created_at),
    updated_at: Number(row.updated_at),
  };
}

/** Pools with their risk parameters and aggregate accounting. */
export class PoolRegistry {
  constructor(private readonly db: LedgerDb) {}

  get(id: string): Pool | null {
    const row = this.db.prepare('SELECT * FROM pools WHERE id = ?').get(id) as PoolRow | undefined;
    return row ? toPool(row) : null;
  }

  require(id: string): Pool {
    const pool = this.get(id);
    if (!pool) throw new LedgerError('PoolNotFound', `no pool '${id}'`, { poolId: id });
    return pool;
  }

  list(): Pool[] {
    const rows = this.db.prepare('SELECT * FROM pools ORDER BY created_at ASC, id ASC').all() as PoolRow[];
    return rows.map(toPool);
  }

  create(spec: NewPool, now: number): Pool {
    if (this.get(spec.id)) throw new LedgerError('PoolExists', `pool '${spec.id}' already exists`, { poolId: spec.id });
    this.db.prepare(`
      INSERT INTO pools(id, orientation, interest_rate, reserve_fee_rate, collateral_factor,
                        total_borrow_amount, total_asset_amount, total_reserve_amount, current_balance_amount,
                        created_at, updated_at)
      VALUES(?, ?, ?, ?, ?, '0', '0', '0', '0', ?, ?)
    `).run(spec.id, spec.orientation, spec.interestRate, spec.reserveFeeRate, spec.collateralFactor, now, now);
    return this.require(spec.id);
  }

  updateParams(id: string, params: PoolParams, now: number): Pool {
    this.require(id);
    this.db.prepare('UPDATE pools SET interest_rate = ?, reserve_fee_rate = ?, collateral_factor = ?, updated_at = ? WHERE id = ?')
      .run(params.interestRate, params.reserveFeeRate, params.collateralFactor, now, id);
    return this.require(id);
  }

  saveTotals(id: string, totals: PoolTotals, now: number): void {
    this.db.prepare(`
      UPDATE pools SET total_borrow_amount = ?, total_asset_amount = ?, total_reserve_amount = ?,
                       current_balance_amount = ?, updated_at = ?
      WHERE id = ?
    `).run(
      bigintToDb(totals.totalBorrowAmount),
      bigintToDb(totals.totalAssetAmount),
      bigintToDb(totals.totalReserveAmount),
      bigintToDb(totals.currentBalanceAmount),
      now,
      id,
    );
  }
}
