import { LoanStatusType, PaymentPlanTypeType } from '../../../common/utils/constants/status.constants';

export interface Loan {
  id: string;
  loanNumber: string;
  branchId: string;
  customerId: string;
  itemId: string;

  loanAmount: number;
  principalRemaining: number;
  interestRemaining: number;
  lateFeeRemaining: number;
  amountPaid: number;

  status: LoanStatusType;
  dueDate: Date;
  gracePeriodDays: number;
  paidDate: Date | null;

  paymentPlanType: PaymentPlanTypeType;
  requiresMinimumPayment: boolean;
  minimumPaymentAmount: number | null;

  /** Optimistic concurrency token, incremented on every balance write. */
  version: number;
  updatedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface LoanInstallment {
  id: string;
  loanId: string;
  installmentNumber: number;
  dueDate: Date;
  principalAmount: number;
  interestAmount: number;
  totalAmount: number;
  amountPaid: number;
  isPaid: boolean;
  paidDate: Date | null;
}

export interface LoanBalances {
  lateFeeRemaining: number;
  interestRemaining: number;
  principalRemaining: number;
}

export interface LoanOverdueStatus {
  isOverdue: boolean;
  isInGracePeriod: boolean;
  daysUntilDue: number;
  daysOverdue: number;
}

export interface LoanSummary extends LoanOverdueStatus {
  loan: Loan;
  remainingBalance: number;
}

export interface PayoffQuote {
  loanId: string;
  payoff: number;
  lateFee: number;
  interest: number;
  principal: number;
}

export interface MinimumPaymentQuote {
  loanId: string;
  minimumPayment: number;
  remainingBalance: number;
}
