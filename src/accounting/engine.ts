import { ceilDiv, floorDiv } from '../utils/bigint.js';
import { invariant } from '../utils/errors.js';
import type { Loan, LoanTerms } from '../loans/types.js';
import type { Orientation, PoolParams, PoolTotals } from '../pools/types.js';
import { collateralValue, type AssetScale, type PriceRate } from './pricing.js';

export const DAY_SECONDS = 86_400;
export const DAYS_PER_YEAR = 365n;
export const DEFAULT_DISCOUNT_RATE = 95;

/**
 * Liquidity owned by depositors: outstanding debt plus idle balance, less the
 * fee reserve. Always recomputed from the pool's aggregates.
 */
export function totalLiquidity(pool: PoolTotals): bigint {
  const liquidity = pool.totalBorrowAmount + pool.currentBalanceAmount - pool.totalReserveAmount;
  invariant(liquidity >= 0n, 'total liquidity went negative', {
    totalBorrowAmount: pool.totalBorrowAmount,
    currentBalanceAmount: pool.currentBalanceAmount,
    totalReserveAmount: pool.totalReserveAmount,
  });
  return liquidity;
}

/** Shares minted for a deposit. 1:1 while the pool has no shares or no liquidity. */
export function toShares(amount: bigint, totalAssetAmount: bigint, liquidity: bigint): bigint {
  if (totalAssetAmount === 0n || liquidity === 0n) return amount;
  return floorDiv(amount * totalAssetAmount, liquidity);
}

/** Asset amount redeemed for `shares`, rounded up. */
export function toAmount(shares: bigint, liquidity: bigint, totalAssetAmount: bigint): bigint {
  invariant(totalAssetAmount > 0n, 'redeeming shares from a pool with none outstanding', { shares });
  return ceilDiv(shares * liquidity, totalAssetAmount);
}

export function borrowableAmount(
  collateralAmount: bigint,
  params: PoolParams,
  orientation: Orientation,
  rate: PriceRate,
  scale: AssetScale,
): bigint {
  return collateralValue(collateralAmount, params.collateralFactor, orientation, rate, scale);
}

export function durationInDays(duration: number): bigint {
  return BigInt(Math.floor(duration / DAY_SECONDS));
}

/**
 * Simple daily interest plus origination fee. Each division truncates in
 * order, so the daily amount is floored before it is multiplied by the days.
 */
export function loanTerms(borrowable: bigint, params: PoolParams, duration: number): LoanTerms {
  const yearly = borrowable * BigInt(params.interestRate) / 100n;
  const daily = yearly / DAYS_PER_YEAR;
  const interestAmount = daily * durationInDays(duration);
  const feeAmount = borrowable * BigInt(params.reserveFeeRate) / 100n;
  return {
    interestAmount,
    feeAmount,
    repayAmount: borrowable + interestAmount + feeAmount,
  };
}

/** What a liquidator pays for `collateralAmount`: its value at `discountRate` percent. */
export function payoffQuote(
  collateralAmount: bigint,
  orientation: Orientation,
  rate: PriceRate,
  scale: AssetScale,
  discountRate: number = DEFAULT_DISCOUNT_RATE,
): bigint {
  return collateralValue(collateralAmount, discountRate, orientation, rate, scale);
}

/**
 * Reserve after closing `loan` by liquidation for `payAmount`. The loan's own
 * fee leaves the reserve; a payoff above the outstanding debt also credits the
 * part above principal plus interest.
 */
export function reserveAfterLiquidation(
  reserve: bigint,
  loan: Pick<Loan, 'repayAmount' | 'borrowedAmount' | 'interestAmount' | 'feeAmount'>,
  payAmount: bigint,
): bigint {
  let next = reserve - loan.feeAmount;
  if (payAmount > loan.repayAmount) {
    next += payAmount - (loan.interestAmount + loan.borrowedAmount);
  }
  invariant(next >= 0n, 'reserve would go negative on liquidation', {
    reserve,
    feeAmount: loan.feeAmount,
    payAmount,
  });
  return next;
}
