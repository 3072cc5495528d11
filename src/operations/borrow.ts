import { borrowableAmount, loanTerms } from '../accounting/engine.js';
import { collateralAsset, depositAsset } from '../pools/types.js';
import { LedgerError } from '../utils/errors.js';
import { commitTotals, type OperationContext } from './context.js';

export type BorrowResult = {
  borrowable: bigint;
  repayAmount: bigint;
  interestAmount: bigint;
  feeAmount: bigint;
};

export function borrow(ctx: OperationContext, caller: string, poolId: string, collateralAmount: bigint, duration: number): BorrowResult {
  const pool = ctx.pools.require(poolId);
  const existing = ctx.loans.get(poolId, caller);
  if (existing && existing.collateralAmount > 0n) {
    throw new LedgerError('AlreadyBorrowed', 'an active loan already exists in this pool', { poolId, repayAmount: existing.repayAmount });
  }
  if (collateralAmount <= 0n) throw new LedgerError('ZeroCollateral', 'collateral amount must be positive', { collateralAmount });
  if (!Number.isSafeInteger(duration) || duration <= 0) {
    throw new LedgerError('InvalidDuration', 'duration must be a positive whole number of seconds', { duration });
  }

  const colAsset = collateralAsset(pool.orientation);
  const available = ctx.custody.balanceOf(colAsset, caller);
  if (available < collateralAmount) {
    throw new LedgerError('InsufficientCollateral', `collateral balance ${available} is below ${collateralAmount}`, { asset: colAsset, available, collateralAmount });
  }

  const borrowable = borrowableAmount(collateralAmount, pool.params, pool.orientation, ctx.rate(), ctx.scale);
  if (borrowable === 0n) throw new LedgerError('ZeroAmount', 'collateral is worth nothing at this rate', { collateralAmount });
  if (pool.currentBalanceAmount < borrowable) {
    throw new LedgerError('InsufficientLiquidity', `pool holds ${pool.currentBalanceAmount}, loan needs ${borrowable}`, {
      borrowable,
      currentBalanceAmount: pool.currentBalanceAmount,
    });
  }

  const terms = loanTerms(borrowable, pool.params, duration);
  if (existing) ctx.loans.close(poolId, caller);
  ctx.loans.insert({
    pool_id: poolId,
    principal: caller,
    collateralAmount,
    borrowedAmount: borrowable,
    repayAmount: terms.repayAmount,
    interestAmount: terms.interestAmount,
    feeAmount: terms.feeAmount,
    startTime: ctx.now,
    duration,
  });
  commitTotals(ctx, poolId, {
    ...pool,
    totalBorrowAmount: pool.totalBorrowAmount + terms.repayAmount,
    totalReserveAmount: pool.totalReserveAmount + terms.feeAmount,
    currentBalanceAmount: pool.currentBalanceAmount - borrowable,
  });

  ctx.custody.transferIn(colAsset, caller, collateralAmount, `borrow:collateral:${poolId}`);
  ctx.custody.transferOut(depositAsset(pool.orientation), caller, borrowable, `borrow:disburse:${poolId}`);
  return { borrowable, ...terms };
}
