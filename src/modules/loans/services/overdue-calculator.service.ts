import { Injectable } from '@nestjs/common';
import { Loan, LoanOverdueStatus } from '../interfaces/loan.interface';
import { LoanStatus } from '../../../common/utils/constants/status.constants';

const MS_PER_HOUR = 60 * 60 * 1000;

type OverdueInput = Pick<Loan, 'dueDate' | 'gracePeriodDays' | 'status'>;

/**
 * Read-only due-date math for display. Payment eligibility never depends on it.
 */
@Injectable()
export class OverdueCalculatorService {
  isOverdue(loan: OverdueInput, now: Date): boolean {
    return loan.status === LoanStatus.ACTIVE && now.getTime() > loan.dueDate.getTime();
  }

  isInGracePeriod(loan: OverdueInput, now: Date): boolean {
    if (!this.isOverdue(loan, now)) return false;
    const graceEnds = new Date(loan.dueDate);
    graceEnds.setUTCDate(graceEnds.getUTCDate() + loan.gracePeriodDays);
    return now.getTime() < graceEnds.getTime();
  }

  daysUntilDue(loan: OverdueInput, now: Date): number {
    const days = this.wholeDays(loan.dueDate.getTime() - now.getTime());
    return days > 0 ? days : 0;
  }

  daysOverdue(loan: OverdueInput, now: Date): number {
    if (!this.isOverdue(loan, now)) return 0;
    return this.wholeDays(now.getTime() - loan.dueDate.getTime());
  }

  evaluate(loan: OverdueInput, now: Date): LoanOverdueStatus {
    return {
      isOverdue: this.isOverdue(loan, now),
      isInGracePeriod: this.isInGracePeriod(loan, now),
      daysUntilDue: this.daysUntilDue(loan, now),
      daysOverdue: this.daysOverdue(loan, now),
    };
  }

  // whole hours first, then truncate to days
  private wholeDays(ms: number): number {
    const hours = Math.trunc(ms / MS_PER_HOUR);
    return Math.trunc(hours / 24);
  }
}
