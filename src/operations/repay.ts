import { collateralAsset, depositAsset } from '../pools/types.js';
import { minBigint } from '../utils/bigint.js';
import { LedgerError } from '../utils/errors.js';
import { commitTotals, type OperationContext } from './context.js';

export type RepayResult = {
  repaid: bigint;
  remaining: bigint;
  collateralReleased: bigint;
};

/**
 * Pay down the caller's loan. Offers above the outstanding amount are clamped;
 * the payment that brings it to zero releases the collateral.
 */
export function repay(ctx: OperationContext, caller: string, poolId: string, amount: bigint): RepayResult {
  const pool = ctx.pools.require(poolId);
  const loan = ctx.loans.get(poolId, caller);
  if (!loan || loan.repayAmount === 0n) throw new LedgerError('NoActiveLoan', 'nothing to repay in this pool', { poolId });

  const asset = depositAsset(pool.orientation);
  const pay = minBigint(amount, loan.repayAmount);
  if (pay <= 0n) throw new LedgerError('ZeroRepay', 'repay amount must be positive', { amount });
  const available = ctx.custody.balanceOf(asset, caller);
  if (available === 0n) throw new LedgerError('ZeroRepay', 'caller holds none of the repay asset', { asset });
  if (available < pay) {
    throw new LedgerError('InsufficientBalance', `balance ${available} is below repayment ${pay}`, { asset, available, amount: pay });
  }

  ctx.custody.transferIn(asset, caller, pay, `repay:${poolId}`);
  const remaining = loan.repayAmount - pay;
  commitTotals(ctx, poolId, {
    ...pool,
    totalBorrowAmount: pool.totalBorrowAmount - pay,
    currentBalanceAmount: pool.currentBalanceAmount + pay,
  });

  if (remaining > 0n) {
    ctx.loans.setRepayAmount(poolId, caller, remaining);
    return { repaid: pay, remaining, collateralReleased: 0n };
  }
  ctx.loans.close(poolId, caller);
  ctx.custody.transferOut(collateralAsset(pool.orientation), caller, loan.collateralAmount, `repay:release:${poolId}`);
  return { repaid: pay, remaining: 0n, collateralReleased: loan.collateralAmount };
}
