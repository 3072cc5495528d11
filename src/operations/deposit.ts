import { toShares, totalLiquidity } from '../accounting/engine.js';
import { depositAsset } from '../pools/types.js';
import { LedgerError } from '../utils/errors.js';
import { commitTotals, type OperationContext } from './context.js';

export type DepositResult = { amount: bigint; shares: bigint };

export function deposit(ctx: OperationContext, caller: string, poolId: string, amount: bigint): DepositResult {
  if (amount <= 0n) throw new LedgerError('ZeroAmount', 'deposit amount must be positive', { amount });
  const pool = ctx.pools.require(poolId);
  const asset = depositAsset(pool.orientation);

  const available = ctx.custody.balanceOf(asset, caller);
  if (available < amount) {
    throw new LedgerError('InsufficientBalance', `balance ${available} is below deposit ${amount}`, { asset, available, amount });
  }

  const shares = toShares(amount, pool.totalAssetAmount, totalLiquidity(pool));
  if (shares === 0n) throw new LedgerError('ZeroAmount', 'deposit too small to mint a share', { amount });

  ctx.custody.transferIn(asset, caller, amount, `deposit:${poolId}`);
  ctx.depositors.credit(poolId, caller, shares, ctx.now);
  commitTotals(ctx, poolId, {
    ...pool,
    currentBalanceAmount: pool.currentBalanceAmount + amount,
    totalAssetAmount: pool.totalAssetAmount + shares,
  });
  return { amount, shares };
}
