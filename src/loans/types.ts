export type LoanStatus = 'active' | 'repaying' | 'liquidatable' | 'closed';

export type Loan = {
  pool_id: string;
  principal: string;
  collateralAmount: bigint;
  borrowedAmount: bigint;
  repayAmount: bigint;
  interestAmount: bigint;
  feeAmount: bigint;
  startTime: number; // unix seconds
  duration: number;  // seconds
};

export type LoanTerms = {
  interestAmount: bigint;
  feeAmount: bigint;
  repayAmount: bigint;
};
