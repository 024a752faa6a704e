import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { formatMoney } from '../utils/money';

export const SettlementErrorCode = {
  LOAN_NOT_FOUND: 'LOAN_NOT_FOUND',
  PAYMENT_NOT_FOUND: 'PAYMENT_NOT_FOUND',
  LOAN_NOT_PAYABLE: 'LOAN_NOT_PAYABLE',
  PAYMENT_NOT_REVERSIBLE: 'PAYMENT_NOT_REVERSIBLE',
  OVERPAYMENT: 'OVERPAYMENT',
  CONCURRENCY_CONFLICT: 'CONCURRENCY_CONFLICT',
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
  LEDGER_INVARIANT_VIOLATION: 'LEDGER_INVARIANT_VIOLATION',
} as const;

export type SettlementErrorCodeType = typeof SettlementErrorCode[keyof typeof SettlementErrorCode];

export class LoanNotFoundException extends NotFoundException {
  readonly code = SettlementErrorCode.LOAN_NOT_FOUND;

  constructor(readonly loanId: string) {
    super({ message: `Loan ${loanId} not found`, code: SettlementErrorCode.LOAN_NOT_FOUND });
  }
}

export class PaymentNotFoundException extends NotFoundException {
  readonly code = SettlementErrorCode.PAYMENT_NOT_FOUND;

  constructor(readonly paymentId: string) {
    super({ message: `Payment ${paymentId} not found`, code: SettlementErrorCode.PAYMENT_NOT_FOUND });
  }
}

export class LoanNotPayableException extends ConflictException {
  readonly code = SettlementErrorCode.LOAN_NOT_PAYABLE;

  constructor(readonly loanId: string, readonly status: string) {
    super({
      message: `Loan ${loanId} is ${status} and cannot receive payments`,
      code: SettlementErrorCode.LOAN_NOT_PAYABLE,
      details: { loanId, status },
    });
  }
}

export class PaymentNotReversibleException extends ConflictException {
  readonly code = SettlementErrorCode.PAYMENT_NOT_REVERSIBLE;

  constructor(readonly paymentId: string, readonly status: string) {
    super({
      message: `Payment ${paymentId} is ${status} and cannot be reversed`,
      code: SettlementErrorCode.PAYMENT_NOT_REVERSIBLE,
      details: { paymentId, status },
    });
  }
}

export class OverpaymentException extends BadRequestException {
  readonly code = SettlementErrorCode.OVERPAYMENT;

  constructor(readonly paymentAmount: number, readonly totalOwed: number) {
    super({
      message: `Payment amount (${formatMoney(paymentAmount)}) exceeds total owed (${formatMoney(totalOwed)})`,
      code: SettlementErrorCode.OVERPAYMENT,
      details: { paymentAmount, totalOwed },
    });
  }
}

/**
 * Lost the per-loan lock or version race. The whole settle/reverse call may be retried.
 */
export class ConcurrencyConflictException extends ConflictException {
  readonly code = SettlementErrorCode.CONCURRENCY_CONFLICT;

  constructor(message = 'Loan was modified concurrently, please retry', options?: { cause?: unknown }) {
    super({ message, code: SettlementErrorCode.CONCURRENCY_CONFLICT }, { cause: options?.cause });
  }
}

export class PersistenceException extends ServiceUnavailableException {
  readonly code = SettlementErrorCode.PERSISTENCE_ERROR;

  constructor(message = 'Storage operation failed', options?: { cause?: unknown }) {
    super({ message, code: SettlementErrorCode.PERSISTENCE_ERROR }, { cause: options?.cause });
  }
}

export class LedgerInvariantException extends InternalServerErrorException {
  readonly code = SettlementErrorCode.LEDGER_INVARIANT_VIOLATION;

  constructor(message: string, details?: Record<string, unknown>) {
    super({ message, code: SettlementErrorCode.LEDGER_INVARIANT_VIOLATION, details });
  }
}
