import { totalLiquidity } from '../accounting/engine.js';
import type { AssetScale, PriceRate } from '../accounting/pricing.js';
import type { Custody } from '../custody/types.js';
import type { DepositorLedger } from '../depositors/ledger.js';
import type { LoanLedger } from '../loans/ledger.js';
import type { PoolRegistry } from '../pools/registry.js';
import type { PoolTotals } from '../pools/types.js';
import { invariant } from '../utils/errors.js';

/** Everything a handler touches during one guarded, transactional operation. */
export type OperationContext = {
  pools: PoolRegistry;
  depositors: DepositorLedger;
  loans: LoanLedger;
  custody: Custody;
  now: number;
  /** Oracle value for this operation; the feed is read at most once. */
  rate: () => PriceRate;
  scale: AssetScale;
  discountRate: number;
};

export function commitTotals(ctx: OperationContext, poolId: string, totals: PoolTotals): void {
  invariant(
    totals.totalBorrowAmount >= 0n && totals.totalAssetAmount >= 0n && totals.totalReserveAmount >= 0n && totals.currentBalanceAmount >= 0n,
    'pool aggregate went negative',
    { poolId, ...totals },
  );
  totalLiquidity(totals);
  ctx.pools.saveTotals(poolId, totals, ctx.now);
}
