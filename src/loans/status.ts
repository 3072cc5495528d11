import type { Loan, LoanStatus } from './types.js';

export function dueTime(loan: Pick<Loan, 'startTime' | 'duration'>): number {
  return loan.startTime + loan.duration;
}

export function isLiquidatable(loan: Pick<Loan, 'startTime' | 'duration' | 'collateralAmount'>, now: number): boolean {
  return loan.collateralAmount > 0n && now >= dueTime(loan);
}

export function status(loan: Loan | null, now: number): LoanStatus {
  if (!loan || loan.repayAmount <= 0n) return 'closed';
  if (isLiquidatable(loan, now)) return 'liquidatable';
  const original = loan.borrowedAmount + loan.interestAmount + loan.feeAmount;
  return loan.repayAmount < original ? 'repaying' : 'active';
}
