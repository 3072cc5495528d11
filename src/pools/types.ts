export type AssetKind = 'A' | 'B';

/** Which asset a pool takes as collateral; the other one is deposited and lent. */
export type Orientation = 'asset-a-collateral' | 'asset-b-collateral';

export const ORIENTATIONS: readonly Orientation[] = ['asset-a-collateral', 'asset-b-collateral'];

export function collateralAsset(o: Orientation): AssetKind {
  return o === 'asset-a-collateral' ? 'A' : 'B';
}

export function depositAsset(o: Orientation): AssetKind {
  return o === 'asset-a-collateral' ? 'B' : 'A';
}

export type PoolParams = {
  interestRate: number;    // percent per year
  reserveFeeRate: number;  // percent of principal, taken at origination
  collateralFactor: number; // percent of collateral value lendable
};

export type Pool = {
  id: string;
  orientation: Orientation;
  params: PoolParams;
  totalBorrowAmount: bigint;
  totalAssetAmount: bigint;
  totalReserveAmount: bigint;
  currentBalanceAmount: bigint;
  created_at: number;
  updated_at: number;
};

export type PoolTotals = Pick<Pool, 'totalBorrowAmount' | 'totalAssetAmount' | 'totalReserveAmount' | 'currentBalanceAmount'>;

export type NewPool = {
  id: string;
  orientation: Orientation;
} & PoolParams;
