import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { BASE_POOL, codeOf, DAY, makeLedger, PAR, seedPool, T0, type Harness } from './helpers.js';

describe('borrow and repay', () => {
  let h: Harness;

  beforeEach(() => {
    h = makeLedger();
    seedPool(h, BASE_POOL, { alice: 1_000_000n });
    h.custody.credit('A', 'bob', 500_000n);
  });

  afterEach(() => {
    h.ledger.close();
  });

  test('borrow locks collateral, pays out the borrowable amount and books the debt', () => {
    expect(h.ledger.borrow('bob', 'col-a', 500_000n, 180 * DAY)).toEqual({
      borrowable: 400_000n,
      interestAmount: 19_620n,
      feeAmount: 0n,
      repayAmount: 419_620n,
    });
    expect(h.custody.balanceOf('A', 'bob')).toBe(0n);
    expect(h.custody.balanceOf('B', 'bob')).toBe(400_000n);
    expect(h.ledger.getLoan('col-a', 'bob')).toEqual({
      pool_id: 'col-a',
      principal: 'bob',
      collateralAmount: 500_000n,
      borrowedAmount: 400_000n,
      repayAmount: 419_620n,
      interestAmount: 19_620n,
      feeAmount: 0n,
      startTime: T0,
      duration: 180 * DAY,
    });
    expect(h.ledger.getLoanStatus('col-a', 'bob')).toBe('active');
    expect(h.ledger.getPool('col-a')).toMatchObject({ totalBorrowAmount: 419_620n, currentBalanceAmount: 600_000n });
    expect(h.ledger.getTotalLiquidity('col-a')).toBe(1_019_620n);
  });

  test('validation order and messages', () => {
    expect(codeOf(() => h.ledger.borrow('bob', 'nope', 1n, DAY))).toBe('PoolNotFound');
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 0n, DAY))).toBe('ZeroCollateral');
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 10n, 0))).toBe('InvalidDuration');
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 10n, -DAY))).toBe('InvalidDuration');
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 10n, 1.5))).toBe('InvalidDuration');
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 500_001n, DAY))).toBe('InsufficientCollateral');
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 1n, DAY))).toBe('ZeroAmount');
    expect(h.ledger.getLoan('col-a', 'bob')).toBeNull();
  });

  test('one loan per principal per pool', () => {
    h.ledger.borrow('bob', 'col-a', 250_000n, DAY);
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 250_000n, DAY))).toBe('AlreadyBorrowed');
  });

  test('borrowable above idle balance is InsufficientLiquidity', () => {
    h.custody.credit('A', 'dave', 2_000_000n);
    expect(codeOf(() => h.ledger.borrow('dave', 'col-a', 2_000_000n, DAY))).toBe('InsufficientLiquidity');
    expect(h.custody.balanceOf('A', 'dave')).toBe(2_000_000n);
  });

  test('a stale oracle blocks borrowing', () => {
    h.feed.set(PAR, T0 - 3601);
    expect(codeOf(() => h.ledger.borrow('bob', 'col-a', 500_000n, DAY))).toBe('StaleOrUnavailable');
    expect(h.custody.balanceOf('A', 'bob')).toBe(500_000n);
  });

  test('partial then clamped full repayment releases collateral once', () => {
    h.ledger.borrow('bob', 'col-a', 500_000n, 180 * DAY);
    expect(h.ledger.repay('bob', 'col-a', 100_000n)).toEqual({ repaid: 100_000n, remaining: 319_620n, collateralReleased: 0n });
    expect(h.ledger.getLoanStatus('col-a', 'bob')).toBe('repaying');
    expect(h.ledger.getPool('col-a')).toMatchObject({ totalBorrowAmount: 319_620n, currentBalanceAmount: 700_000n });

    h.custody.credit('B', 'bob', 19_620n);
    expect(h.ledger.repay('bob', 'col-a', 1_000_000n)).toEqual({ repaid: 319_620n, remaining: 0n, collateralReleased: 500_000n });
    expect(h.custody.balanceOf('A', 'bob')).toBe(500_000n);
    expect(h.custody.balanceOf('B', 'bob')).toBe(0n);
    expect(h.ledger.getLoan('col-a', 'bob')).toBeNull();
    expect(h.ledger.getLoanStatus('col-a', 'bob')).toBe('closed');
    expect(codeOf(() => h.ledger.repay('bob', 'col-a', 1n))).toBe('NoActiveLoan');
    expect(h.custody.balanceOf('A', 'bob')).toBe(500_000n);

    // the lender ends with principal plus interest
    expect(h.ledger.withdraw('alice', 'col-a')).toEqual({ amount: 1_019_620n, shares: 1_000_000n });
  });

  test('borrow then full repay returns the pool to its prior debt with the interest and fee added to its balance', () => {
    seedPool(h, { ...BASE_POOL, id: 'fee-5', reserveFeeRate: 5 }, { carol: 1_000_000n });
    const before = h.ledger.getPool('fee-5');
    const loan = h.ledger.borrow('bob', 'fee-5', 500_000n, 180 * DAY);
    expect(loan).toEqual({ borrowable: 400_000n, interestAmount: 19_620n, feeAmount: 20_000n, repayAmount: 439_620n });

    h.custody.credit('B', 'bob', loan.repayAmount - loan.borrowable);
    expect(h.ledger.repay('bob', 'fee-5', loan.repayAmount).remaining).toBe(0n);

    const after = h.ledger.getPool('fee-5');
    expect(after?.currentBalanceAmount).toBe(1_039_620n);
    expect(before?.currentBalanceAmount).toBe(1_000_000n);
    expect(after?.totalBorrowAmount).toBe(before?.totalBorrowAmount);
    expect(after?.totalReserveAmount).toBe(20_000n);
    expect(h.ledger.getTotalLiquidity('fee-5')).toBe(1_019_620n);
  });

  test('repay rejects zero offers, empty wallets and short balances', () => {
    expect(codeOf(() => h.ledger.repay('bob', 'col-a', 1n))).toBe('NoActiveLoan');
    h.ledger.borrow('bob', 'col-a', 500_000n, 180 * DAY);
    expect(codeOf(() => h.ledger.repay('bob', 'col-a', 0n))).toBe('ZeroRepay');
    expect(codeOf(() => h.ledger.repay('bob', 'col-a', 419_620n))).toBe('InsufficientBalance');
    h.custody.transferIn('B', 'bob', 400_000n, 'spent elsewhere');
    expect(codeOf(() => h.ledger.repay('bob', 'col-a', 10n))).toBe('ZeroRepay');
    expect(h.ledger.getLoan('col-a', 'bob')?.repayAmount).toBe(419_620n);
  });

  test('a closed loan can be reopened', () => {
    expect(h.ledger.borrow('bob', 'col-a', 500_000n, DAY).repayAmount).toBe(400_109n);
    h.custody.credit('B', 'bob', 109n);
    h.ledger.repay('bob', 'col-a', 400_109n);
    expect(h.ledger.getLoan('col-a', 'bob')).toBeNull();
    h.advance(DAY);
    expect(h.ledger.borrow('bob', 'col-a', 500_000n, DAY).borrowable).toBe(400_000n);
    expect(h.ledger.getLoan('col-a', 'bob')?.startTime).toBe(T0 + DAY);
  });
});
