import type { SqlExecutor } from '../../database/sql-executor';
import { LoanInstallment } from './interfaces/loan.interface';
import { dateOnly, nullableDate, numeric } from '../../database/pg-values';

export interface InstallmentStore {
  /** Ordered by installment number ascending. */
  listByLoan(loanId: string, options?: { forUpdate?: boolean }): Promise<LoanInstallment[]>;
  update(installment: LoanInstallment): Promise<void>;
}

type InstallmentRow = {
  id: string;
  loan_id: string;
  installment_number: number;
  due_date: string;
  principal_amount: string;
  interest_amount: string;
  total_amount: string;
  amount_paid: string;
  is_paid: boolean;
  paid_date: Date | null;
};

function toInstallment(row: InstallmentRow): LoanInstallment {
  return {
    id: row.id,
    loanId: row.loan_id,
    installmentNumber: row.installment_number,
    dueDate: dateOnly(row.due_date),
    principalAmount: numeric(row.principal_amount),
    interestAmount: numeric(row.interest_amount),
    totalAmount: numeric(row.total_amount),
    amountPaid: numeric(row.amount_paid),
    isPaid: row.is_paid,
    paidDate: nullableDate(row.paid_date),
  };
}

export class PgInstallmentRepository implements InstallmentStore {
  constructor(private readonly client: SqlExecutor) {}

  async listByLoan(loanId: string, options: { forUpdate?: boolean } = {}): Promise<LoanInstallment[]> {
    const result = await this.client.query<InstallmentRow>(
      `SELECT id, loan_id, installment_number, due_date, principal_amount, interest_amount,
              total_amount, amount_paid, is_paid, paid_date
         FROM loan_installments
        WHERE loan_id = $1
        ORDER BY installment_number ASC${options.forUpdate ? ' FOR UPDATE' : ''}`,
      [loanId],
    );
    return result.rows.map(toInstallment);
  }

  async update(installment: LoanInstallment): Promise<void> {
    await this.client.query(
      `UPDATE loan_installments
          SET amount_paid = $2, is_paid = $3, paid_date = $4, updated_at = NOW()
        WHERE id = $1`,
      [installment.id, installment.amountPaid, installment.isPaid, installment.paidDate],
    );
  }
}
