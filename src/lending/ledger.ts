import dayjs from 'dayjs';
import type { Logger } from 'pino';
import { totalLiquidity } from '../accounting/engine.js';
import type { AssetScale } from '../accounting/pricing.js';
import { loadConfig, type LedgerConfig } from '../config/index.js';
import type { Custody } from '../custody/types.js';
import { WalletCustody } from '../custody/wallet.js';
import { openLedgerDb, type LedgerDb } from '../db/connection.js';
import { DepositorLedger } from '../depositors/ledger.js';
import { LedgerEvents, type LedgerEventMap, type LedgerEventName } from '../events/notifications.js';
import { LoanLedger } from '../loans/ledger.js';
import { status as loanStatus } from '../loans/status.js';
import type { Loan, LoanStatus } from '../loans/types.js';
import { OracleAdapter, type PriceFeed } from '../oracle/adapter.js';
import { createPool, updatePoolParams } from '../operations/admin.js';
import { borrow, type BorrowResult } from '../operations/borrow.js';
import type { OperationContext } from '../operations/context.js';
import { deposit, type DepositResult } from '../operations/deposit.js';
import { getPayoffQuote, liquidate, type LiquidateResult } from '../operations/liquidate.js';
import { repay, type RepayResult } from '../operations/repay.js';
import { previewWithdraw, withdraw, type WithdrawResult } from '../operations/withdraw.js';
import { PoolRegistry } from '../pools/registry.js';
import type { NewPool, Pool, PoolParams } from '../pools/types.js';
import { ExecutionGuard } from '../util/locks.js';
import { LedgerError, logFailure, normalizeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export type LedgerOptions = {
  feed: PriceFeed;
  config?: LedgerConfig;
  /** unix seconds */
  clock?: () => number;
  logger?: Logger;
  db?: LedgerDb;
  custody?: Custody;
};

export const systemClock = (): number => dayjs().unix();

/**
 * The lending ledger. Every mutating call takes the authenticated caller
 * first, runs under one ledger-wide single-flight guard inside one SQLite
 * transaction, and emits its notification only after commit.
 */
export class LendingLedger {
  readonly config: LedgerConfig;
  readonly db: LedgerDb;
  readonly pools: PoolRegistry;
  readonly depositors: DepositorLedger;
  readonly loans: LoanLedger;
  readonly custody: Custody;
  readonly events = new LedgerEvents();
  readonly guard = new ExecutionGuard();
  private readonly oracle: OracleAdapter;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly scale: AssetScale;

  constructor(opts: LedgerOptions) {
    this.config = opts.config ?? loadConfig();
    this.clock = opts.clock ?? systemClock;
    this.log = (opts.logger ?? createLogger()).child({ scope: 'ledger' });
    this.db = opts.db ?? openLedgerDb(this.config.database.path, this.log);
    this.pools = new PoolRegistry(this.db);
    this.depositors = new DepositorLedger(this.db);
    this.loans = new LoanLedger(this.db);
    this.custody = opts.custody ?? new WalletCustody(this.db, this.config.treasury, this.clock);
    this.oracle = new OracleAdapter(opts.feed, this.config.oracle.maxAgeSeconds);
    this.scale = { A: this.config.assets.A.decimals, B: this.config.assets.B.decimals };
  }

  // ── administration ────────────────────────────────────────────────────────

  createPool(caller: string, spec: NewPool): Pool {
    const pool = this.run('createPool', { caller, poolId: spec.id }, (ctx) =>
      createPool(ctx.pools, this.config.owner, caller, spec, ctx.now));
    this.notify('pool-created', { poolId: pool.id, orientation: pool.orientation, params: pool.params });
    return pool;
  }

  updatePoolParams(caller: string, poolId: string, patch: Partial<PoolParams>): Pool {
    const pool = this.run('updatePoolParams', { caller, poolId }, (ctx) =>
      updatePoolParams(ctx.pools, this.config.owner, caller, poolId, patch, ctx.now));
    this.notify('pool-updated', { poolId, params: pool.params });
    return pool;
  }

  // ── operations ────────────────────────────────────────────────────────────

  deposit(caller: string, poolId: string, amount: bigint): DepositResult {
    const res = this.run('deposit', { caller, poolId, amount }, (ctx) => deposit(ctx, caller, poolId, amount));
    this.notify('deposit', { poolId, principal: caller, ...res });
    return res;
  }

  withdraw(caller: string, poolId: string): WithdrawResult {
    const res = this.run('withdraw', { caller, poolId }, (ctx) => withdraw(ctx, caller, poolId));
    this.notify('withdraw', { poolId, principal: caller, ...res });
    return res;
  }

  borrow(caller: string, poolId: string, collateralAmount: bigint, duration: number): BorrowResult {
    const res = this.run('borrow', { caller, poolId, collateralAmount, duration }, (ctx) =>
      borrow(ctx, caller, poolId, collateralAmount, duration));
    this.notify('borrow', { poolId, principal: caller, collateralAmount, borrowable: res.borrowable, repayAmount: res.repayAmount, duration });
    return res;
  }

  repay(caller: string, poolId: string, amount: bigint): RepayResult {
    const res = this.run('repay', { caller, poolId, amount }, (ctx) => repay(ctx, caller, poolId, amount));
    this.notify('repay', { poolId, principal: caller, amount: res.repaid, remaining: res.remaining, collateralReleased: res.collateralReleased });
    return res;
  }

  liquidate(caller: string, poolId: string, target: string): LiquidateResult {
    const res = this.run('liquidate', { caller, poolId, target }, (ctx) => liquidate(ctx, caller, poolId, target));
    this.notify('liquidate', { poolId, liquidator: caller, borrower: target, ...res });
    return res;
  }

  // ── queries ───────────────────────────────────────────────────────────────

  getPool(poolId: string): Pool | null {
    return this.pools.get(poolId);
  }

  listPools(): Pool[] {
    return this.pools.list();
  }

  getTotalLiquidity(poolId: string): bigint {
    return totalLiquidity(this.pools.require(poolId));
  }

  getShareBalance(poolId: string, principal: string): bigint {
    return this.depositors.shareBalance(poolId, principal);
  }

  previewWithdraw(poolId: string, principal: string): bigint {
    return previewWithdraw({ pools: this.pools, depositors: this.depositors }, principal, poolId);
  }

  getLoan(poolId: string, principal: string): Loan | null {
    return this.loans.get(poolId, principal);
  }

  getLoanStatus(poolId: string, principal: string): LoanStatus {
    return loanStatus(this.loans.get(poolId, principal), this.clock());
  }

  listLiquidatable(poolId: string): Loan[] {
    this.pools.require(poolId);
    return this.loans.listLiquidatable(poolId, this.clock());
  }

  getPayoffQuote(poolId: string, target: string): bigint {
    const now = this.clock();
    return getPayoffQuote(
      { pools: this.pools, loans: this.loans, rate: this.oracle.snapshot(now), scale: this.scale, discountRate: this.config.liquidation.discountRate },
      poolId,
      target,
    );
  }

  close(): void {
    this.events.removeAll();
    this.db.close();
  }

  // ── plumbing ──────────────────────────────────────────────────────────────

  private run<T>(op: string, info: { caller: string; target?: string } & Record<string, unknown>, fn: (ctx: OperationContext) => T): T {
    const t0 = Date.now();
    try {
      const result = this.guard.runExclusive(op, () => {
        this.rejectTreasury(info.caller, info.target);
        const now = this.clock();
        const ctx: OperationContext = {
          pools: this.pools,
          depositors: this.depositors,
          loans: this.loans,
          custody: this.custody,
          now,
          rate: this.oracle.snapshot(now),
          scale: this.scale,
          discountRate: this.config.liquidation.discountRate,
        };
        return this.db.transaction(() => fn(ctx))();
      });
      this.log.info({ op, ...info, ok: true, ms: Date.now() - t0 }, 'ledger_op');
      return result;
    } catch (err) {
      logFailure(this.log, { op, ...info, ms: Date.now() - t0 }, err);
      throw err;
    }
  }

  /** The custody account holding pooled funds never acts as a principal. */
  private rejectTreasury(...principals: (string | undefined)[]): void {
    if (principals.includes(this.config.treasury)) {
      throw new LedgerError('Unauthorized', 'the treasury account cannot take part in ledger operations', { treasury: this.config.treasury });
    }
  }

  private notify<K extends LedgerEventName>(event: K, payload: LedgerEventMap[K]): void {
    try {
      this.events.emit(event, payload);
    } catch (err) {
      // already committed
      this.log.error({ event, error: normalizeError(err) }, 'ledger_listener_failed');
    }
  }
}
