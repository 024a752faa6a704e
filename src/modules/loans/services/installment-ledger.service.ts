import { Injectable } from '@nestjs/common';
import { LoanInstallment } from '../interfaces/loan.interface';
import { addMoney, compareMoney, isZero, minMoney, subtractMoney, toMoney } from '../../../common/utils/money';

/**
 * Spreads payments over an installment schedule. Both operations return only the
 * installments they changed, as new objects; the input array is left untouched.
 */
@Injectable()
export class InstallmentLedgerService {
  /** Oldest unpaid installment first. A remainder nothing can absorb is dropped. */
  distribute(installments: LoanInstallment[], amount: number, now: Date): LoanInstallment[] {
    const touched: LoanInstallment[] = [];
    let remaining = toMoney(amount);

    const ordered = [...installments]
      .filter((installment) => !installment.isPaid)
      .sort((a, b) => a.installmentNumber - b.installmentNumber);

    for (const installment of ordered) {
      if (compareMoney(remaining, 0) <= 0) break;

      const outstanding = subtractMoney(installment.totalAmount, installment.amountPaid);
      if (compareMoney(outstanding, 0) <= 0) continue;

      const applied = minMoney(remaining, outstanding);
      remaining = subtractMoney(remaining, applied);

      const amountPaid = addMoney(installment.amountPaid, applied);
      const isPaid = compareMoney(amountPaid, installment.totalAmount) >= 0;

      touched.push({
        ...installment,
        amountPaid,
        isPaid,
        paidDate: isPaid ? now : installment.paidDate,
      });
    }

    return touched;
  }

  /** Newest installment first, so the inverse of `distribute` for the same amount. */
  reverseDistribute(installments: LoanInstallment[], amount: number): LoanInstallment[] {
    const touched: LoanInstallment[] = [];
    let remaining = toMoney(amount);

    const ordered = [...installments].sort((a, b) => b.installmentNumber - a.installmentNumber);

    for (const installment of ordered) {
      if (compareMoney(remaining, 0) <= 0) break;
      if (isZero(installment.amountPaid)) continue;

      const pulled = minMoney(remaining, installment.amountPaid);
      remaining = subtractMoney(remaining, pulled);

      const amountPaid = subtractMoney(installment.amountPaid, pulled);
      const isPaid = compareMoney(amountPaid, installment.totalAmount) >= 0;

      touched.push({
        ...installment,
        amountPaid,
        isPaid,
        paidDate: isPaid ? installment.paidDate : null,
      });
    }

    return touched;
  }
}
