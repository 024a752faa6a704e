import { BadRequestException } from '@nestjs/common';
import { AuditService } from './audit.service';
import { AuditContextService } from './audit-context.service';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { silentLogger } from '../../../test/support/silent-logger';
import { InMemoryUnitOfWork } from '../../../test/support/in-memory-unit-of-work';
import { buildLoan } from '../../../test/support/fixtures';

describe('AuditService', () => {
  let service: AuditService;
  let unitOfWork: InMemoryUnitOfWork;
  let auditContext: AuditContextService;
  let logger: StructuredLoggerService;

  beforeEach(() => {
    unitOfWork = new InMemoryUnitOfWork();
    auditContext = new AuditContextService();
    logger = silentLogger();

    service = new AuditService(unitOfWork, auditContext, logger);
  });

  // -----------------------------------------------------
  // SUCCESSFUL TRANSACTION
  // -----------------------------------------------------
  it('should commit the work with START and SUCCESS rows', async () => {
    unitOfWork.seedLoan(buildLoan());

    const result = await service.run(
      'txn123',
      'SETTLE_PAYMENT',
      'userA',
      { amount: 100 },
      async (scope) => {
        const loan = await scope.loans.findByIdForUpdate('loan-1');
        return loan?.loanNumber;
      },
      { service: 'settlement', loanId: 'loan-1' },
    );

    expect(result).toBe('LN-2026-000001');
    expect(unitOfWork.commits).toBe(1);
    expect(unitOfWork.auditLogs().map((row) => [row.operation, row.loanId, row.userId, row.metadata])).toEqual([
      ['SETTLE_PAYMENT_START', 'loan-1', 'userA', { amount: 100 }],
      ['SETTLE_PAYMENT_SUCCESS', 'loan-1', 'userA', { amount: 100 }],
    ]);
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ service: 'settlement', operation: 'SETTLE_PAYMENT', transactionId: 'txn123' }),
    );
  });

  // -----------------------------------------------------
  // AUDIT CONTEXT
  // -----------------------------------------------------
  it('should expose the audit context to the executor', async () => {
    let seen: string | undefined;

    await service.run(
      'txn-ctx',
      'REVERSE_PAYMENT',
      'userB',
      {},
      async () => {
        seen = auditContext.getContext()?.transactionId;
      },
      { service: 'reversal' },
    );

    expect(seen).toBe('txn-ctx');
    expect(auditContext.getContext()).toBeUndefined();
  });

  // -----------------------------------------------------
  // FAILURE
  // -----------------------------------------------------
  it('should roll back, record FAILED and rethrow when the executor fails', async () => {
    await expect(
      service.run(
        'txn1',
        'OP',
        'userX',
        { foo: 1 },
        async (scope) => {
          await scope.outbox.enqueue({
            aggregateType: 'customer',
            aggregateId: 'customer-1',
            eventType: 'customer.total_paid.adjusted',
            payload: { customerId: 'customer-1', delta: 5, paymentId: 'p', loanId: 'l' },
          });
          throw new Error('Boom');
        },
        { service: 'settlement' },
      ),
    ).rejects.toThrow('Boom');

    expect(unitOfWork.rollbacks).toBe(1);
    expect(unitOfWork.outboxMessages()).toEqual([]);
    expect(unitOfWork.auditLogs().map((row) => [row.operation, row.metadata])).toEqual([
      ['OP_FAILED', { foo: 1, error: 'Boom' }],
    ]);
    expect(logger.error).toHaveBeenCalledWith(expect.objectContaining({ operation: 'OP_FAILED' }));
  });

  it('should log client errors as warnings', async () => {
    await expect(
      service.run(
        'txn2',
        'OP',
        'userX',
        {},
        async () => {
          throw new BadRequestException('bad input');
        },
        { service: 'settlement' },
      ),
    ).rejects.toBeInstanceOf(BadRequestException);

    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ operation: 'OP_FAILED' }));
    expect(logger.error).not.toHaveBeenCalled();
  });

  // -----------------------------------------------------
  // GET AUDIT TRAIL
  // -----------------------------------------------------
  it('should fetch the audit trail by transaction and by loan', async () => {
    await service.run('txn-a', 'A', 'u', {}, async () => undefined, { service: 'loan', loanId: 'loan-1' });
    await service.run('txn-b', 'B', 'u', {}, async () => undefined, { service: 'loan', loanId: 'loan-2' });

    const byTransaction = await service.getAuditTrail('txn-b');
    const byLoan = await service.getLoanAuditTrail('loan-1');

    expect(byTransaction.map((row) => row.operation)).toEqual(['B_START', 'B_SUCCESS']);
    expect(byLoan.map((row) => row.operation)).toEqual(['A_START', 'A_SUCCESS']);
  });
});
