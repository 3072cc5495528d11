import path from 'node:path';
import { loadConfig } from '../../src/config/index.js';
import { WalletCustody } from '../../src/custody/wallet.js';
import { openLedgerDb, type LedgerDb } from '../../src/db/connection.js';
import { LendingLedger } from '../../src/lending/ledger.js';
import { StaticPriceFeed } from '../../src/oracle/adapter.js';
import type { NewPool } from '../../src/pools/types.js';
import { isLedgerError, type LedgerErrorCode } from '../../src/utils/errors.js';
import { createLogger } from '../../src/utils/logger.js';

export const T0 = 1_700_000_000;
export const DAY = 86_400;
/** 1 B per A at 8 decimals. */
export const PAR = 100_000_000n;
export const OWNER = 'owner';

export const BASE_POOL: NewPool = {
  id: 'col-a',
  orientation: 'asset-a-collateral',
  interestRate: 10,
  reserveFeeRate: 0,
  collateralFactor: 80,
};

type CustodyFactory = (db: LedgerDb, treasury: string, clock: () => number) => WalletCustody;

export type Harness = {
  ledger: LendingLedger;
  custody: WalletCustody;
  feed: StaticPriceFeed;
  now: () => number;
  /** Move the clock forward; the feed is refreshed at the new time. */
  advance: (seconds: number) => void;
  setRate: (value: bigint) => void;
};

export function makeLedger(opts: { custody?: CustodyFactory; assets?: { A: number; B: number } } = {}): Harness {
  const decimals = opts.assets ?? { A: 6, B: 6 };
  const config = loadConfig({
    file: path.join(__dirname, 'no-such-config.json'),
    overrides: {
      owner: OWNER,
      assets: { A: { symbol: 'COL', decimals: decimals.A }, B: { symbol: 'USD', decimals: decimals.B } },
    },
    env: {},
  });
  let now = T0;
  let rate = PAR;
  const clock = () => now;
  const db = openLedgerDb(':memory:', createLogger());
  const makeCustody: CustodyFactory = opts.custody ?? ((d, t, c) => new WalletCustody(d, t, c));
  const custody = makeCustody(db, config.treasury, clock);
  const feed = new StaticPriceFeed(rate, 8, T0);
  const ledger = new LendingLedger({ feed, config, clock, db, custody });
  return {
    ledger,
    custody,
    feed,
    now: clock,
    advance: (seconds) => {
      now += seconds;
      feed.set(rate, now);
    },
    setRate: (value) => {
      rate = value;
      feed.set(value, now);
    },
  };
}

/** Run `fn` and return the LedgerError code it raised. */
export function codeOf(fn: () => unknown): LedgerErrorCode | 'none' | 'untagged' {
  try {
    fn();
  } catch (e) {
    return isLedgerError(e) ? e.code : 'untagged';
  }
  return 'none';
}

/** Owner creates `spec`, then each lender funds and deposits its amount. */
export function seedPool(h: Harness, spec: NewPool, lenders: Record<string, bigint>): void {
  h.ledger.createPool(OWNER, spec);
  const asset = spec.orientation === 'asset-a-collateral' ? 'B' : 'A';
  for (const [who, amount] of Object.entries(lenders)) {
    h.custody.credit(asset, who, amount);
    h.ledger.deposit(who, spec.id, amount);
  }
}
