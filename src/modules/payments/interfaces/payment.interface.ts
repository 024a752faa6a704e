import { Loan } from '../../loans/interfaces/loan.interface';
import { PaymentMethodType, PaymentStatusType } from '../../../common/utils/constants/status.constants';

export interface PaymentAllocation {
  lateFeeApplied: number;
  interestApplied: number;
  principalApplied: number;
}

export interface Payment {
  id: string;
  paymentNumber: string;
  branchId: string;
  loanId: string;
  customerId: string;

  amount: number;
  principalAmount: number;
  interestAmount: number;
  lateFeeAmount: number;

  paymentMethod: PaymentMethodType;
  referenceNumber: string | null;

  status: PaymentStatusType;
  paymentDate: Date;

  loanBalanceAfter: number;
  interestBalanceAfter: number;

  reversedAt: Date | null;
  reversedBy: string | null;
  reversalReason: string | null;

  notes: string | null;
  cashSessionId: string | null;
  createdBy: string;
  createdAt: Date;
}

export type NewPayment = Omit<Payment, 'id' | 'createdAt'>;

export type PaymentReversalFields = Pick<Payment, 'id' | 'status' | 'reversedAt' | 'reversedBy' | 'reversalReason'>;

export interface SettlementResult {
  payment: Payment;
  loan: Loan;
  isFullyPaid: boolean;
  remainingBalance: number;
}

export interface PaymentHistoryFilter {
  from?: Date;
  to?: Date;
}
