#!/usr/bin/env node
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { totalLiquidity } from '../accounting/engine.js';
import { loadConfig, type LedgerConfig } from '../config/index.js';
import { openLedgerDb } from '../db/connection.js';
import { DepositorLedger } from '../depositors/ledger.js';
import { LoanLedger } from '../loans/ledger.js';
import { dueTime, status } from '../loans/status.js';
import type { Loan } from '../loans/types.js';
import { PoolRegistry } from '../pools/registry.js';
import { collateralAsset, depositAsset, type Pool } from '../pools/types.js';
import { formatUnits } from '../utils/bigint.js';
import { createLogger } from '../utils/logger.js';
import { getPalette, type Palette } from './theme.js';

dayjs.extend(utc);

export function formatDue(unixSeconds: number): string {
  return dayjs.unix(unixSeconds).utc().format('YYYY-MM-DD HH:mm[Z]');
}

export function renderPool(pool: Pool, loans: Loan[], depositorCount: number, config: LedgerConfig, palette: Palette, now: number): string[] {
  const dep = config.assets[depositAsset(pool.orientation)];
  const col = config.assets[collateralAsset(pool.orientation)];
  const amt = (v: bigint) => `${formatUnits(v, dep.decimals)} ${dep.symbol}`;
  const { interestRate, reserveFeeRate, collateralFactor } = pool.params;

  const lines = [
    palette.title(`${pool.id}`) + palette.dim(`  ${col.symbol} → ${dep.symbol}`),
    `  params     interest ${interestRate}%/yr · fee ${reserveFeeRate}% · collateral factor ${collateralFactor}%`,
    `  liquidity  ${amt(totalLiquidity(pool))}`,
    `  idle       ${amt(pool.currentBalanceAmount)}`,
    `  borrowed   ${amt(pool.totalBorrowAmount)}`,
    `  reserve    ${amt(pool.totalReserveAmount)}`,
    `  shares     ${pool.totalAssetAmount.toString()} across ${depositorCount} depositor(s)`,
  ];
  if (!loans.length) {
    lines.push(palette.dim('  no open loans'));
    return lines;
  }
  for (const loan of loans) {
    const st = status(loan, now);
    const tag = st === 'liquidatable' ? palette.error(st) : st === 'repaying' ? palette.warn(st) : palette.success(st);
    lines.push(
      `  loan ${loan.principal}: owes ${amt(loan.repayAmount)} on ${formatUnits(loan.collateralAmount, col.decimals)} ${col.symbol}, due ${formatDue(dueTime(loan))} [${tag}]`,
    );
  }
  return lines;
}

export function main(argv: string[] = process.argv.slice(2)): number {
  const palette = getPalette();
  const fileArg = argv.find((a) => !a.startsWith('--'));
  const config = loadConfig(fileArg ? { overrides: { database: { path: fileArg } } } : {});
  const log = createLogger();
  const db = openLedgerDb(config.database.path, log);
  try {
    const pools = new PoolRegistry(db);
    const loans = new LoanLedger(db);
    const depositors = new DepositorLedger(db);
    const now = dayjs().unix();
    const all = pools.list();
    if (!all.length) {
      console.log(palette.dim(`no pools in ${config.database.path}`));
      return 0;
    }
    for (const pool of all) {
      console.log(renderPool(pool, loans.list(pool.id), depositors.list(pool.id).length, config, palette, now).join('\n'));
    }
    return 0;
  } finally {
    db.close();
  }
}

if (require.main === module) {
  process.exitCode = main();
}
