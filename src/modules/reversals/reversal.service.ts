import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { AuditService } from '../audit/audit.service';
import { CollateralService } from '../items/collateral.service';
import { InstallmentLedgerService } from '../loans/services/installment-ledger.service';
import { remainingBalance, restoreAllocation } from '../loans/loan.aggregate';
import { customerTotalPaidAdjusted } from '../outbox/outbox-messages';
import { Payment, PaymentReversalFields } from '../payments/interfaces/payment.interface';
import { ReversePaymentDto } from './dto/reverse-payment.dto';
import { ReversalOutcome } from './interfaces/reversal.interface';
import { RepositoryScope } from '../../database/repository-scope';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import {
  LoanNotFoundException,
  PaymentNotFoundException,
  PaymentNotReversibleException,
} from '../../common/errors/settlement.errors';
import { LoanStatus, PaymentPlanType, PaymentStatus } from '../../common/utils/constants/status.constants';
import { retryOnConflict } from '../../common/utils/retry';

@Injectable()
export class ReversalService {
  constructor(
    private readonly auditService: AuditService,
    private readonly ledger: InstallmentLedgerService,
    private readonly collateral: CollateralService,
    private readonly structuredLogger: StructuredLoggerService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Undoes a completed payment: its splits go back onto the loan, installments
   * are unwound newest first and the payment is marked reversed. A paid loan
   * becomes active again and its item goes back into collateral.
   */
  async reverse(paymentId: string, dto: ReversePaymentDto, userId: string): Promise<Payment> {
    const reason = dto.reason?.trim() ?? '';
    if (!reason) throw new BadRequestException('Reversal reason is required');

    const transactionId = `reverse_${paymentId}_${Date.now()}`;

    const outcome = await retryOnConflict(
      () =>
        this.auditService.run(
          transactionId,
          'REVERSE_PAYMENT',
          userId,
          { paymentId, reason },
          (scope) => this.apply(scope, paymentId, reason, userId, transactionId),
          { service: 'reversal' },
        ),
      {
        maxAttempts: this.config.settlement.maxAttempts,
        onRetry: (attempt) =>
          this.structuredLogger.warn({
            service: 'reversal',
            operation: 'REVERSE_PAYMENT_RETRY',
            transactionId,
            userId,
            metadata: { paymentId, attempt, maxAttempts: this.config.settlement.maxAttempts },
          }),
      },
    );

    this.structuredLogger.info({
      service: 'reversal',
      operation: 'PAYMENT_REVERSED',
      transactionId,
      userId,
      metadata: {
        paymentId,
        loanId: outcome.loan.id,
        amount: outcome.payment.amount,
        loanStatus: outcome.loan.status,
        loanReactivated: outcome.loanReactivated,
      },
    });

    if (outcome.loanReactivated) {
      await this.collateral.repledge(outcome.loan.itemId, { loanId: outcome.loan.id, transactionId, userId });
    }
    return outcome.payment;
  }

  private async apply(
    scope: RepositoryScope,
    paymentId: string,
    reason: string,
    userId: string,
    transactionId: string,
  ): Promise<ReversalOutcome> {
    const found = await scope.payments.findById(paymentId);
    if (!found) throw new PaymentNotFoundException(paymentId);

    // loan first, then payment: the same lock order settlement uses
    const loan = await scope.loans.findByIdForUpdate(found.loanId);
    if (!loan) throw new LoanNotFoundException(found.loanId);

    const payment = await scope.payments.findByIdForUpdate(paymentId);
    if (!payment) throw new PaymentNotFoundException(paymentId);
    if (payment.status !== PaymentStatus.COMPLETED) {
      throw new PaymentNotReversibleException(payment.id, payment.status);
    }

    const loanReactivated = loan.status === LoanStatus.PAID;
    const saved = await scope.loans.update(restoreAllocation(loan, payment, userId));

    if (saved.paymentPlanType === PaymentPlanType.INSTALLMENTS) {
      const installments = await scope.installments.listByLoan(saved.id, { forUpdate: true });
      for (const installment of this.ledger.reverseDistribute(installments, payment.amount)) {
        await scope.installments.update(installment);
      }
    }

    await scope.outbox.enqueue(
      customerTotalPaidAdjusted({
        customerId: payment.customerId,
        delta: -payment.amount,
        paymentId: payment.id,
        loanId: saved.id,
      }),
    );

    const reversal: PaymentReversalFields = {
      id: payment.id,
      status: PaymentStatus.REVERSED,
      reversedAt: new Date(),
      reversedBy: userId,
      reversalReason: reason,
    };
    await scope.payments.update(reversal);

    await scope.auditLogs.create({
      transactionId,
      operation: 'PAYMENT_REVERSED',
      loanId: saved.id,
      userId,
      metadata: {
        paymentId: payment.id,
        paymentNumber: payment.paymentNumber,
        amount: payment.amount,
        lateFeeAmount: payment.lateFeeAmount,
        interestAmount: payment.interestAmount,
        principalAmount: payment.principalAmount,
        reason,
        remainingBalance: remainingBalance(saved),
        loanStatus: saved.status,
      },
    });

    return { payment: { ...payment, ...reversal }, loan: saved, loanReactivated };
  }
}
