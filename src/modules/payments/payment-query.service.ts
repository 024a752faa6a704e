import { Injectable } from '@nestjs/common';
import { UnitOfWork } from '../../database/unit-of-work';
import { Payment, PaymentHistoryFilter } from './interfaces/payment.interface';
import { PaymentNotFoundException } from '../../common/errors/settlement.errors';

@Injectable()
export class PaymentQueryService {
  constructor(private readonly unitOfWork: UnitOfWork) {}

  async getPayment(paymentId: string): Promise<Payment> {
    const payment = await this.unitOfWork.session((scope) => scope.payments.findById(paymentId));
    if (!payment) throw new PaymentNotFoundException(paymentId);
    return payment;
  }

  /** Oldest first; both bounds are inclusive. */
  async listForLoan(loanId: string, filter: PaymentHistoryFilter = {}): Promise<Payment[]> {
    return this.unitOfWork.session((scope) => scope.payments.listByLoan(loanId, filter));
  }
}
