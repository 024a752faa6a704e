import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PaymentAllocation } from '../interfaces/payment.interface';
import { LoanBalances } from '../../loans/interfaces/loan.interface';
import { addMoney, minMoney, subtractMoney, toMoney } from '../../../common/utils/money';

@Injectable()
export class AllocationWaterfallService {
  /**
   * Splits a payment across the loan's buckets: late fee first, then interest,
   * then principal. Whatever the principal cannot absorb is left unallocated;
   * callers reject overpayment before getting here.
   */
  allocate(
    paymentAmount: number,
    lateFeeRemaining: number,
    interestRemaining: number,
    principalRemaining: number,
  ): PaymentAllocation {
    let remaining = Decimal.max(toMoney(paymentAmount), 0).toNumber();

    const lateFeeApplied = minMoney(remaining, Math.max(lateFeeRemaining, 0));
    remaining = subtractMoney(remaining, lateFeeApplied);

    const interestApplied = minMoney(remaining, Math.max(interestRemaining, 0));
    remaining = subtractMoney(remaining, interestApplied);

    const principalApplied = minMoney(remaining, Math.max(principalRemaining, 0));

    return { lateFeeApplied, interestApplied, principalApplied };
  }

  totalOwed(balances: LoanBalances): number {
    return addMoney(balances.lateFeeRemaining, balances.interestRemaining, balances.principalRemaining);
  }
}
