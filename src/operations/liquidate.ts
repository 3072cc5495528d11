import { payoffQuote, reserveAfterLiquidation } from '../accounting/engine.js';
import { dueTime } from '../loans/status.js';
import { collateralAsset, depositAsset } from '../pools/types.js';
import { LedgerError } from '../utils/errors.js';
import { commitTotals, type OperationContext } from './context.js';

export type LiquidateResult = {
  collateralReleased: bigint;
  payAmount: bigint;
};

/** Discounted price of the target's collateral; reads nothing but `collateralAmount`. */
export function getPayoffQuote(ctx: Pick<OperationContext, 'pools' | 'loans' | 'rate' | 'scale' | 'discountRate'>, poolId: string, target: string): bigint {
  const pool = ctx.pools.require(poolId);
  const loan = ctx.loans.get(poolId, target);
  if (!loan || loan.collateralAmount === 0n) throw new LedgerError('NoCollateral', 'target has no collateral in this pool', { poolId, target });
  return payoffQuote(loan.collateralAmount, pool.orientation, ctx.rate(), ctx.scale, ctx.discountRate);
}

export function liquidate(ctx: OperationContext, caller: string, poolId: string, target: string): LiquidateResult {
  if (caller === target) throw new LedgerError('SelfLiquidation', 'cannot liquidate your own loan', { poolId });
  const pool = ctx.pools.require(poolId);
  const loan = ctx.loans.get(poolId, target);
  if (!loan || loan.collateralAmount === 0n) throw new LedgerError('NoCollateral', 'target has no collateral in this pool', { poolId, target });
  if (ctx.now < dueTime(loan)) {
    throw new LedgerError('NotYetLiquidatable', `loan is due at ${dueTime(loan)}`, { dueTime: dueTime(loan), now: ctx.now });
  }

  const payAmount = payoffQuote(loan.collateralAmount, pool.orientation, ctx.rate(), ctx.scale, ctx.discountRate);
  const asset = depositAsset(pool.orientation);
  const available = ctx.custody.balanceOf(asset, caller);
  if (available < payAmount) {
    throw new LedgerError('InsufficientBalance', `balance ${available} is below payoff ${payAmount}`, { asset, available, payAmount });
  }

  const reserve = reserveAfterLiquidation(pool.totalReserveAmount, loan, payAmount);
  ctx.loans.close(poolId, target);
  commitTotals(ctx, poolId, {
    ...pool,
    currentBalanceAmount: pool.currentBalanceAmount + payAmount,
    totalBorrowAmount: pool.totalBorrowAmount - loan.repayAmount,
    totalReserveAmount: reserve,
  });

  if (payAmount > 0n) ctx.custody.transferIn(asset, caller, payAmount, `liquidate:pay:${poolId}`);
  ctx.custody.transferOut(collateralAsset(pool.orientation), caller, loan.collateralAmount, `liquidate:collateral:${poolId}`);
  return { collateralReleased: loan.collateralAmount, payAmount };
}
