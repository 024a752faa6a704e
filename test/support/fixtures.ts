import { Loan, LoanInstallment } from '../../src/modules/loans/interfaces/loan.interface';
import { Payment } from '../../src/modules/payments/interfaces/payment.interface';
import {
  LoanStatus,
  PaymentMethod,
  PaymentPlanType,
  PaymentStatus,
} from '../../src/common/utils/constants/status.constants';

export const FIXED_NOW = new Date('2026-03-10T12:00:00.000Z');

export function buildLoan(overrides: Partial<Loan> = {}): Loan {
  return {
    id: 'loan-1',
    loanNumber: 'LN-2026-000001',
    branchId: 'branch-1',
    customerId: 'customer-1',
    itemId: 'item-1',
    loanAmount: 500,
    principalRemaining: 500,
    interestRemaining: 50,
    lateFeeRemaining: 10,
    amountPaid: 0,
    status: LoanStatus.ACTIVE,
    dueDate: new Date('2026-04-01T00:00:00.000Z'),
    gracePeriodDays: 5,
    paidDate: null,
    paymentPlanType: PaymentPlanType.SINGLE,
    requiresMinimumPayment: false,
    minimumPaymentAmount: null,
    version: 1,
    updatedBy: null,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function buildInstallment(
  installmentNumber: number,
  overrides: Partial<LoanInstallment> = {},
): LoanInstallment {
  return {
    id: `inst-${installmentNumber}`,
    loanId: 'loan-1',
    installmentNumber,
    dueDate: new Date(Date.UTC(2026, installmentNumber, 1)),
    principalAmount: 80,
    interestAmount: 20,
    totalAmount: 100,
    amountPaid: 0,
    isPaid: false,
    paidDate: null,
    ...overrides,
  };
}

export function buildPayment(overrides: Partial<Payment> = {}): Payment {
  return {
    id: 'payment-1',
    paymentNumber: 'PY-2026-000001',
    branchId: 'branch-1',
    loanId: 'loan-1',
    customerId: 'customer-1',
    amount: 100,
    principalAmount: 40,
    interestAmount: 50,
    lateFeeAmount: 10,
    paymentMethod: PaymentMethod.CASH,
    referenceNumber: null,
    status: PaymentStatus.COMPLETED,
    paymentDate: FIXED_NOW,
    loanBalanceAfter: 460,
    interestBalanceAfter: 0,
    reversedAt: null,
    reversedBy: null,
    reversalReason: null,
    notes: null,
    cashSessionId: null,
    createdBy: 'user-1',
    createdAt: FIXED_NOW,
    ...overrides,
  };
}
