import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { AuditService } from '../audit/audit.service';
import { CollateralService } from '../items/collateral.service';
import { AllocationWaterfallService } from './services/allocation-waterfall.service';
import { InstallmentLedgerService } from '../loans/services/installment-ledger.service';
import { applyAllocation, assertPayable, isFullyPaid, remainingBalance } from '../loans/loan.aggregate';
import { customerTotalPaidAdjusted } from '../outbox/outbox-messages';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { SettlementResult } from './interfaces/payment.interface';
import { RepositoryScope } from '../../database/repository-scope';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { LoanNotFoundException, OverpaymentException } from '../../common/errors/settlement.errors';
import { PaymentPlanType, PaymentStatus } from '../../common/utils/constants/status.constants';
import { compareMoney, toMoney } from '../../common/utils/money';
import { retryOnConflict } from '../../common/utils/retry';

@Injectable()
export class SettlementService {
  constructor(
    private readonly auditService: AuditService,
    private readonly waterfall: AllocationWaterfallService,
    private readonly ledger: InstallmentLedgerService,
    private readonly collateral: CollateralService,
    private readonly structuredLogger: StructuredLoggerService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Applies a payment to a loan: late fee, then interest, then principal.
   * Loan, payment, installments, outbox and audit rows are written in one
   * transaction; the whole call is retried when it loses a concurrency race.
   */
  async settle(dto: CreatePaymentDto, userId: string): Promise<SettlementResult> {
    const amount = toMoney(dto.amount);
    if (!(amount > 0)) throw new BadRequestException('Payment amount must be positive');

    const transactionId = `settle_${dto.loanId}_${Date.now()}`;

    const result = await retryOnConflict(
      () =>
        this.auditService.run(
          transactionId,
          'SETTLE_PAYMENT',
          userId,
          { loanId: dto.loanId, amount, paymentMethod: dto.paymentMethod, branchId: dto.branchId },
          (scope) => this.apply(scope, dto, amount, userId, transactionId),
          { service: 'settlement', loanId: dto.loanId },
        ),
      {
        maxAttempts: this.config.settlement.maxAttempts,
        onRetry: (attempt) =>
          this.structuredLogger.warn({
            service: 'settlement',
            operation: 'SETTLE_PAYMENT_RETRY',
            transactionId,
            userId,
            metadata: { loanId: dto.loanId, attempt, maxAttempts: this.config.settlement.maxAttempts },
          }),
      },
    );

    this.structuredLogger.info({
      service: 'settlement',
      operation: 'PAYMENT_SETTLED',
      transactionId,
      userId,
      metadata: {
        loanId: result.loan.id,
        paymentId: result.payment.id,
        paymentNumber: result.payment.paymentNumber,
        amount,
        remainingBalance: result.remainingBalance,
        isFullyPaid: result.isFullyPaid,
      },
    });

    if (result.isFullyPaid) {
      await this.collateral.release(result.loan.itemId, { loanId: result.loan.id, transactionId, userId });
    }
    return result;
  }

  private async apply(
    scope: RepositoryScope,
    dto: CreatePaymentDto,
    amount: number,
    userId: string,
    transactionId: string,
  ): Promise<SettlementResult> {
    const now = new Date();

    const loan = await scope.loans.findByIdForUpdate(dto.loanId);
    if (!loan) throw new LoanNotFoundException(dto.loanId);

    assertPayable(loan);

    const totalOwed = this.waterfall.totalOwed(loan);
    if (compareMoney(amount, totalOwed) > 0) {
      throw new OverpaymentException(amount, totalOwed);
    }

    const allocation = this.waterfall.allocate(
      amount,
      loan.lateFeeRemaining,
      loan.interestRemaining,
      loan.principalRemaining,
    );
    const updated = applyAllocation(loan, allocation, amount, userId, now);

    const paymentNumber = await scope.payments.generateNumber();
    const payment = await scope.payments.create({
      paymentNumber,
      branchId: dto.branchId,
      loanId: loan.id,
      customerId: loan.customerId,
      amount,
      principalAmount: allocation.principalApplied,
      interestAmount: allocation.interestApplied,
      lateFeeAmount: allocation.lateFeeApplied,
      paymentMethod: dto.paymentMethod,
      referenceNumber: dto.referenceNumber ?? null,
      status: PaymentStatus.COMPLETED,
      paymentDate: now,
      loanBalanceAfter: updated.principalRemaining,
      interestBalanceAfter: updated.interestRemaining,
      reversedAt: null,
      reversedBy: null,
      reversalReason: null,
      notes: dto.notes ?? null,
      cashSessionId: dto.cashSessionId ?? null,
      createdBy: userId,
    });

    const saved = await scope.loans.update(updated);

    if (saved.paymentPlanType === PaymentPlanType.INSTALLMENTS) {
      const installments = await scope.installments.listByLoan(saved.id, { forUpdate: true });
      for (const installment of this.ledger.distribute(installments, amount, now)) {
        await scope.installments.update(installment);
      }
    }

    await scope.outbox.enqueue(
      customerTotalPaidAdjusted({ customerId: saved.customerId, delta: amount, paymentId: payment.id, loanId: saved.id }),
    );

    const balance = remainingBalance(saved);
    await scope.auditLogs.create({
      transactionId,
      operation: 'PAYMENT_SETTLED',
      loanId: saved.id,
      userId,
      metadata: {
        paymentId: payment.id,
        paymentNumber,
        amount,
        ...allocation,
        remainingBalance: balance,
        loanStatus: saved.status,
      },
    });

    return {
      payment,
      loan: saved,
      isFullyPaid: isFullyPaid(saved),
      remainingBalance: balance,
    };
  }
}
