import { toAmount, totalLiquidity } from '../accounting/engine.js';
import { depositAsset } from '../pools/types.js';
import { LedgerError } from '../utils/errors.js';
import { commitTotals, type OperationContext } from './context.js';

export type WithdrawResult = { amount: bigint; shares: bigint };

/** Redeem the caller's whole share balance; there is no partial withdrawal. */
export function withdraw(ctx: OperationContext, caller: string, poolId: string): WithdrawResult {
  const pool = ctx.pools.require(poolId);
  const shares = ctx.depositors.shareBalance(poolId, caller);
  if (shares === 0n) throw new LedgerError('ZeroAmount', 'no shares to withdraw', { poolId });

  const amount = toAmount(shares, totalLiquidity(pool), pool.totalAssetAmount);
  if (amount > pool.currentBalanceAmount) {
    throw new LedgerError('Unavailable', `withdrawal of ${amount} exceeds idle balance ${pool.currentBalanceAmount}`, {
      amount,
      currentBalanceAmount: pool.currentBalanceAmount,
    });
  }

  ctx.depositors.remove(poolId, caller);
  commitTotals(ctx, poolId, {
    ...pool,
    currentBalanceAmount: pool.currentBalanceAmount - amount,
    totalAssetAmount: pool.totalAssetAmount - shares,
  });
  if (amount > 0n) ctx.custody.transferOut(depositAsset(pool.orientation), caller, amount, `withdraw:${poolId}`);
  return { amount, shares };
}

/** Amount a full withdrawal would pay right now, without the availability check. */
export function previewWithdraw(ctx: Pick<OperationContext, 'pools' | 'depositors'>, principal: string, poolId: string): bigint {
  const pool = ctx.pools.require(poolId);
  const shares = ctx.depositors.shareBalance(poolId, principal);
  if (shares === 0n) return 0n;
  return toAmount(shares, totalLiquidity(pool), pool.totalAssetAmount);
}
