import { Loan, LoanBalances } from './interfaces/loan.interface';
import { Payment, PaymentAllocation } from '../payments/interfaces/payment.interface';
import { LedgerInvariantException, LoanNotPayableException } from '../../common/errors/settlement.errors';
import { LoanStatus, NON_PAYABLE_LOAN_STATUSES } from '../../common/utils/constants/status.constants';
import { addMoney, compareMoney, isZero, subtractMoney } from '../../common/utils/money';

export function remainingBalance(loan: LoanBalances): number {
  return addMoney(loan.lateFeeRemaining, loan.interestRemaining, loan.principalRemaining);
}

export function isFullyPaid(loan: LoanBalances): boolean {
  return isZero(remainingBalance(loan));
}

export function assertPayable(loan: Loan): void {
  if (NON_PAYABLE_LOAN_STATUSES.includes(loan.status)) {
    throw new LoanNotPayableException(loan.id, loan.status);
  }
}

function assertNonNegative(loan: Loan, fields: Record<string, number>): void {
  const negative = Object.entries(fields).filter(([, value]) => compareMoney(value, 0) < 0);
  if (negative.length > 0) {
    throw new LedgerInvariantException(`Loan ${loan.id} would end with a negative balance`, {
      loanId: loan.id,
      fields: Object.fromEntries(negative),
    });
  }
}

/**
 * Returns the loan after a payment's splits are taken off its balances.
 * The loan becomes `paid` once nothing is owed.
 */
export function applyAllocation(
  loan: Loan,
  allocation: PaymentAllocation,
  amount: number,
  userId: string,
  now: Date,
): Loan {
  const balances = {
    lateFeeRemaining: subtractMoney(loan.lateFeeRemaining, allocation.lateFeeApplied),
    interestRemaining: subtractMoney(loan.interestRemaining, allocation.interestApplied),
    principalRemaining: subtractMoney(loan.principalRemaining, allocation.principalApplied),
  };
  assertNonNegative(loan, balances);

  const paidOff = isFullyPaid(balances);

  return {
    ...loan,
    ...balances,
    amountPaid: addMoney(loan.amountPaid, amount),
    status: paidOff ? LoanStatus.PAID : loan.status,
    paidDate: paidOff ? now : loan.paidDate,
    updatedBy: userId,
  };
}

/**
 * Inverse of applyAllocation for a recorded payment. A paid loan is reactivated.
 */
export function restoreAllocation(loan: Loan, payment: Payment, userId: string): Loan {
  const amountPaid = subtractMoney(loan.amountPaid, payment.amount);
  assertNonNegative(loan, { amountPaid });

  const wasPaid = loan.status === LoanStatus.PAID;

  return {
    ...loan,
    lateFeeRemaining: addMoney(loan.lateFeeRemaining, payment.lateFeeAmount),
    interestRemaining: addMoney(loan.interestRemaining, payment.interestAmount),
    principalRemaining: addMoney(loan.principalRemaining, payment.principalAmount),
    amountPaid,
    status: wasPaid ? LoanStatus.ACTIVE : loan.status,
    paidDate: wasPaid ? null : loan.paidDate,
    updatedBy: userId,
  };
}
