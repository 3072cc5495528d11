import { describe, test, expect } from '@jest/globals';
import type { LedgerEventMap } from '../../src/events/notifications.js';
import { BASE_POOL, codeOf, DAY, makeLedger, OWNER, PAR, seedPool, T0 } from './helpers.js';

describe('pool administration', () => {
  test('only the owner creates and updates pools', () => {
    const h = makeLedger();
    expect(codeOf(() => h.ledger.createPool('mallory', BASE_POOL))).toBe('Unauthorized');
    h.ledger.createPool(OWNER, BASE_POOL);
    expect(codeOf(() => h.ledger.updatePoolParams('mallory', 'col-a', { collateralFactor: 100 }))).toBe('Unauthorized');
    expect(h.ledger.getPool('col-a')?.params.collateralFactor).toBe(80);
    h.ledger.close();
  });

  test('parameters are validated', () => {
    const h = makeLedger();
    expect(codeOf(() => h.ledger.createPool(OWNER, { ...BASE_POOL, collateralFactor: 256 }))).toBe('InvalidParams');
    expect(codeOf(() => h.ledger.createPool(OWNER, { ...BASE_POOL, interestRate: 1.5 }))).toBe('InvalidParams');
    expect(codeOf(() => h.ledger.createPool(OWNER, { ...BASE_POOL, id: 'Bad Id!' }))).toBe('InvalidParams');
    h.ledger.createPool(OWNER, BASE_POOL);
    expect(codeOf(() => h.ledger.createPool(OWNER, BASE_POOL))).toBe('PoolExists');
    expect(codeOf(() => h.ledger.updatePoolParams(OWNER, 'nope', { interestRate: 1 }))).toBe('PoolNotFound');
    expect(codeOf(() => h.ledger.updatePoolParams(OWNER, 'col-a', { reserveFeeRate: -1 }))).toBe('InvalidParams');
    expect(h.ledger.listPools().map((p) => p.id)).toEqual(['col-a']);
    h.ledger.close();
  });

  test('a new collateral factor applies to the next borrow', () => {
    const h = makeLedger();
    seedPool(h, BASE_POOL, { alice: 1_000_000n });
    const updates: LedgerEventMap['pool-updated'][] = [];
    h.ledger.events.on('pool-updated', (e) => updates.push(e));
    h.advance(60);
    const pool = h.ledger.updatePoolParams(OWNER, 'col-a', { collateralFactor: 50 });
    expect(pool.params).toEqual({ interestRate: 10, reserveFeeRate: 0, collateralFactor: 50 });
    expect(pool.updated_at).toBe(T0 + 60);
    expect(updates).toEqual([{ poolId: 'col-a', params: { interestRate: 10, reserveFeeRate: 0, collateralFactor: 50 } }]);

    h.custody.credit('A', 'bob', 500_000n);
    expect(h.ledger.borrow('bob', 'col-a', 500_000n, DAY).borrowable).toBe(250_000n);
    h.ledger.close();
  });

  test('keys left undefined in a patch keep their current value', () => {
    const h = makeLedger();
    h.ledger.createPool(OWNER, BASE_POOL);
    const pool = h.ledger.updatePoolParams(OWNER, 'col-a', { interestRate: undefined, collateralFactor: 60 });
    expect(pool.params).toEqual({ interestRate: 10, reserveFeeRate: 0, collateralFactor: 60 });
    h.ledger.close();
  });
});

describe('asset-b collateral pools', () => {
  test('lend A against B at the oracle rate', () => {
    const h = makeLedger({ assets: { A: 8, B: 6 } });
    h.setRate(30_000n * PAR);
    seedPool(h, { ...BASE_POOL, id: 'col-b', orientation: 'asset-b-collateral' }, { alice: 100_000_000n });
    h.custody.credit('B', 'bob', 3_000_000_000n);

    expect(h.ledger.borrow('bob', 'col-b', 3_000_000_000n, 30 * DAY)).toEqual({
      borrowable: 8_000_000n,
      interestAmount: 65_730n,
      feeAmount: 0n,
      repayAmount: 8_065_730n,
    });
    expect(h.custody.balanceOf('A', 'bob')).toBe(8_000_000n);
    expect(h.custody.balanceOf('B', 'bob')).toBe(0n);
    expect(h.ledger.getPool('col-b')?.currentBalanceAmount).toBe(92_000_000n);
    expect(h.ledger.getPayoffQuote('col-b', 'bob')).toBe(9_500_000n);
    h.ledger.close();
  });
});
