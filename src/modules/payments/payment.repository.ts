import type { SqlExecutor } from '../../database/sql-executor';
import { NewPayment, Payment, PaymentHistoryFilter, PaymentReversalFields } from './interfaces/payment.interface';
import { PaymentMethodType, PaymentStatusType } from '../../common/utils/constants/status.constants';
import { nullableDate, numeric } from '../../database/pg-values';

export interface PaymentStore {
  create(payment: NewPayment): Promise<Payment>;
  /** Writes the reversal fields only; every other column is immutable. */
  update(reversal: PaymentReversalFields): Promise<void>;
  findById(id: string): Promise<Payment | null>;
  findByIdForUpdate(id: string): Promise<Payment | null>;
  /** Unique human-readable identifier, e.g. PY-2026-000042. */
  generateNumber(): Promise<string>;
  listByLoan(loanId: string, filter?: PaymentHistoryFilter): Promise<Payment[]>;
}

type PaymentRow = {
  id: string;
  payment_number: string;
  branch_id: string;
  loan_id: string;
  customer_id: string;
  amount: string;
  principal_amount: string;
  interest_amount: string;
  late_fee_amount: string;
  payment_method: PaymentMethodType;
  reference_number: string | null;
  status: PaymentStatusType;
  payment_date: Date;
  loan_balance_after: string;
  interest_balance_after: string;
  reversed_at: Date | null;
  reversed_by: string | null;
  reversal_reason: string | null;
  notes: string | null;
  cash_session_id: string | null;
  created_by: string;
  created_at: Date;
};

const PAYMENT_COLUMNS = `
  id, payment_number, branch_id, loan_id, customer_id,
  amount, principal_amount, interest_amount, late_fee_amount,
  payment_method, reference_number, status, payment_date,
  loan_balance_after, interest_balance_after,
  reversed_at, reversed_by, reversal_reason,
  notes, cash_session_id, created_by, created_at`;

function toPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    paymentNumber: row.payment_number,
    branchId: row.branch_id,
    loanId: row.loan_id,
    customerId: row.customer_id,
    amount: numeric(row.amount),
    principalAmount: numeric(row.principal_amount),
    interestAmount: numeric(row.interest_amount),
    lateFeeAmount: numeric(row.late_fee_amount),
    paymentMethod: row.payment_method,
    referenceNumber: row.reference_number,
    status: row.status,
    paymentDate: row.payment_date,
    loanBalanceAfter: numeric(row.loan_balance_after),
    interestBalanceAfter: numeric(row.interest_balance_after),
    reversedAt: nullableDate(row.reversed_at),
    reversedBy: row.reversed_by,
    reversalReason: row.reversal_reason,
    notes: row.notes,
    cashSessionId: row.cash_session_id,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

export class PgPaymentRepository implements PaymentStore {
  constructor(private readonly client: SqlExecutor) {}

  async create(payment: NewPayment): Promise<Payment> {
    const result = await this.client.query<PaymentRow>(
      `INSERT INTO payments (
         payment_number, branch_id, loan_id, customer_id,
         amount, principal_amount, interest_amount, late_fee_amount,
         payment_method, reference_number, status, payment_date,
         loan_balance_after, interest_balance_after,
         notes, cash_session_id, created_by
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
       RETURNING ${PAYMENT_COLUMNS}`,
      [
        payment.paymentNumber,
        payment.branchId,
        payment.loanId,
        payment.customerId,
        payment.amount,
        payment.principalAmount,
        payment.interestAmount,
        payment.lateFeeAmount,
        payment.paymentMethod,
        payment.referenceNumber,
        payment.status,
        payment.paymentDate,
        payment.loanBalanceAfter,
        payment.interestBalanceAfter,
        payment.notes,
        payment.cashSessionId,
        payment.createdBy,
      ],
    );
    return toPayment(result.rows[0]);
  }

  async update(reversal: PaymentReversalFields): Promise<void> {
    await this.client.query(
      `UPDATE payments
          SET status = $2, reversed_at = $3, reversed_by = $4, reversal_reason = $5, updated_at = NOW()
        WHERE id = $1`,
      [reversal.id, reversal.status, reversal.reversedAt, reversal.reversedBy, reversal.reversalReason],
    );
  }

  async findById(id: string): Promise<Payment | null> {
    const result = await this.client.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? toPayment(result.rows[0]) : null;
  }

  async findByIdForUpdate(id: string): Promise<Payment | null> {
    const result = await this.client.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE id = $1 FOR UPDATE`,
      [id],
    );
    return result.rows[0] ? toPayment(result.rows[0]) : null;
  }

  async generateNumber(): Promise<string> {
    const result = await this.client.query<{ payment_number: string }>(
      'SELECT generate_payment_number() AS payment_number',
    );
    return result.rows[0].payment_number;
  }

  async listByLoan(loanId: string, filter: PaymentHistoryFilter = {}): Promise<Payment[]> {
    const conditions = ['loan_id = $1'];
    const values: unknown[] = [loanId];

    if (filter.from) {
      values.push(filter.from);
      conditions.push(`payment_date >= $${values.length}`);
    }
    if (filter.to) {
      values.push(filter.to);
      conditions.push(`payment_date <= $${values.length}`);
    }

    const result = await this.client.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE ${conditions.join(' AND ')} ORDER BY payment_date ASC, id ASC`,
      values,
    );
    return result.rows.map(toPayment);
  }
}
