import { Loan } from '../../loans/interfaces/loan.interface';
import { Payment } from '../../payments/interfaces/payment.interface';

export interface ReversalOutcome {
  payment: Payment;
  loan: Loan;
  /** The loan was `paid` before the reversal and is `active` again. */
  loanReactivated: boolean;
}
