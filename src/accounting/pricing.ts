import { floorDiv, pow10 } from '../utils/bigint.js';
import type { Orientation } from '../pools/types.js';
import { LedgerError } from '../utils/errors.js';

/** Fixed-point quote of asset B per one whole unit of asset A. */
export type PriceRate = {
  value: bigint;
  decimals: number;
};

/** Base-unit decimals of each asset kind. */
export type AssetScale = {
  A: number;
  B: number;
};

/**
 * Value `amount` of the pool's collateral asset in the pool's deposit asset,
 * scaled by `percent`, in deposit-asset base units.
 *
 * A-collateral: amount * percent * rate * 10^decB / (100 * 10^rateDec * 10^decA)
 * B-collateral: amount * percent * 10^rateDec * 10^decA / (100 * rate * 10^decB)
 *
 * Every multiplication happens before the single floor division.
 */
export function collateralValue(
  amount: bigint,
  percent: number,
  orientation: Orientation,
  rate: PriceRate,
  scale: AssetScale,
): bigint {
  if (rate.value <= 0n) {
    throw new LedgerError('StaleOrUnavailable', 'price rate must be positive', { value: rate.value, decimals: rate.decimals });
  }
  const pct = BigInt(percent);
  const rateScale = pow10(rate.decimals);
  switch (orientation) {
    case 'asset-a-collateral':
      return floorDiv(amount * pct * rate.value * pow10(scale.B), 100n * rateScale * pow10(scale.A));
    case 'asset-b-collateral':
      return floorDiv(amount * pct * rateScale * pow10(scale.A), 100n * rate.value * pow10(scale.B));
  }
}
