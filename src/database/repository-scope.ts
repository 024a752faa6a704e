import type { SqlExecutor } from './sql-executor';
import { LoanStore, PgLoanRepository } from '../modules/loans/loan.repository';
import { InstallmentStore, PgInstallmentRepository } from '../modules/loans/installment.repository';
import { PaymentStore, PgPaymentRepository } from '../modules/payments/payment.repository';
import { CustomerStore, PgCustomerRepository } from '../modules/customers/customer.repository';
import { ItemStore, PgItemRepository } from '../modules/items/item.repository';
import { OutboxStore, PgOutboxRepository } from '../modules/outbox/outbox.repository';
import { AuditLogStore, PgAuditLogRepository } from '../modules/audit/audit-log.repository';

/**
 * The repositories of one unit of work. Every store shares the same connection,
 * so writes made through any of them commit or roll back together.
 */
export interface RepositoryScope {
  loans: LoanStore;
  installments: InstallmentStore;
  payments: PaymentStore;
  customers: CustomerStore;
  items: ItemStore;
  outbox: OutboxStore;
  auditLogs: AuditLogStore;
}

export function createRepositoryScope(client: SqlExecutor): RepositoryScope {
  return {
    loans: new PgLoanRepository(client),
    installments: new PgInstallmentRepository(client),
    payments: new PgPaymentRepository(client),
    customers: new PgCustomerRepository(client),
    items: new PgItemRepository(client),
    outbox: new PgOutboxRepository(client),
    auditLogs: new PgAuditLogRepository(client),
  };
}
