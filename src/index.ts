export { LendingLedger, systemClock, type LedgerOptions } from './lending/ledger.js';
export {
  totalLiquidity,
  toShares,
  toAmount,
  borrowableAmount,
  loanTerms,
  payoffQuote,
  reserveAfterLiquidation,
  DAY_SECONDS,
  DEFAULT_DISCOUNT_RATE,
} from './accounting/engine.js';
export { collateralValue, type AssetScale, type PriceRate } from './accounting/pricing.js';
export { loadConfig, DEFAULT_CONFIG, type LedgerConfig, type AssetConfig } from './config/index.js';
export type { Custody } from './custody/types.js';
export { WalletCustody, type TransferRecord } from './custody/wallet.js';
export { openLedgerDb, type LedgerDb } from './db/connection.js';
export { LedgerEvents, type LedgerEventMap, type LedgerEventName } from './events/notifications.js';
export { status as loanStatus, dueTime, isLiquidatable } from './loans/status.js';
export type { Loan, LoanStatus, LoanTerms } from './loans/types.js';
export { OracleAdapter, StaticPriceFeed, type PriceFeed, type PriceQuote } from './oracle/adapter.js';
export type { DepositResult } from './operations/deposit.js';
export type { WithdrawResult } from './operations/withdraw.js';
export type { BorrowResult } from './operations/borrow.js';
export type { RepayResult } from './operations/repay.js';
export type { LiquidateResult } from './operations/liquidate.js';
export { collateralAsset, depositAsset, type AssetKind, type Orientation, type Pool, type PoolParams, type NewPool } from './pools/types.js';
export { ExecutionGuard } from './util/locks.js';
export { LedgerError, isLedgerError, type LedgerErrorCode, type ErrorCategory } from './utils/errors.js';
export { createLogger } from './utils/logger.js';
