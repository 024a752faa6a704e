// src/modules/loans/loans.service.ts
import { Injectable } from '@nestjs/common';
import { UnitOfWork } from '../../database/unit-of-work';
import { AuditService } from '../audit/audit.service';
import { AuditLogEntry } from '../audit/audit-log.repository';
import { OverdueCalculatorService } from './services/overdue-calculator.service';
import { remainingBalance } from './loan.aggregate';
import {
  Loan,
  LoanInstallment,
  LoanSummary,
  MinimumPaymentQuote,
  PayoffQuote,
} from './interfaces/loan.interface';
import { LoanNotFoundException } from '../../common/errors/settlement.errors';
import { addMoney, compareMoney, minMoney } from '../../common/utils/money';

@Injectable()
export class LoanService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly auditService: AuditService,
    private readonly overdueCalculator: OverdueCalculatorService,
  ) {}

  async getLoan(id: string): Promise<Loan> {
    const loan = await this.unitOfWork.session((scope) => scope.loans.findById(id));
    if (!loan) throw new LoanNotFoundException(id);
    return loan;
  }

  async getLoanSummary(id: string, now: Date = new Date()): Promise<LoanSummary> {
    const loan = await this.getLoan(id);
    return {
      loan,
      remainingBalance: remainingBalance(loan),
      ...this.overdueCalculator.evaluate(loan, now),
    };
  }

  /** Amount that closes the loan today. */
  async calculatePayoff(id: string): Promise<PayoffQuote> {
    const loan = await this.getLoan(id);
    return {
      loanId: loan.id,
      payoff: remainingBalance(loan),
      lateFee: loan.lateFeeRemaining,
      interest: loan.interestRemaining,
      principal: loan.principalRemaining,
    };
  }

  /**
   * The agreed minimum plus any late fee, never more than the balance.
   * Loans without a minimum-payment arrangement owe the full balance.
   */
  async calculateMinimumPayment(id: string): Promise<MinimumPaymentQuote> {
    const loan = await this.getLoan(id);
    const balance = remainingBalance(loan);

    let minimumPayment = balance;
    if (
      loan.requiresMinimumPayment &&
      loan.minimumPaymentAmount !== null &&
      compareMoney(balance, loan.minimumPaymentAmount) >= 0
    ) {
      minimumPayment = minMoney(addMoney(loan.minimumPaymentAmount, loan.lateFeeRemaining), balance);
    }

    return { loanId: loan.id, minimumPayment, remainingBalance: balance };
  }

  async getInstallments(loanId: string): Promise<LoanInstallment[]> {
    await this.getLoan(loanId);
    return this.unitOfWork.session((scope) => scope.installments.listByLoan(loanId));
  }

  async getAuditTrail(loanId: string): Promise<AuditLogEntry[]> {
    await this.getLoan(loanId);
    return this.auditService.getLoanAuditTrail(loanId);
  }
}
