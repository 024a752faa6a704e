import { HttpException, Injectable } from '@nestjs/common';
import { UnitOfWork } from '../../database/unit-of-work';
import { RepositoryScope } from '../../database/repository-scope';
import { AuditContextService } from './audit-context.service';
import { AuditLogEntry } from './audit-log.repository';
import { AuditRunOptions } from './interfaces/audit-context.interface';
import { describeError, StructuredLoggerService } from '../../common/logging/structured-logger.service';

@Injectable()
export class AuditService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly auditContext: AuditContextService,
    private readonly logger: StructuredLoggerService,
  ) {}

  /**
   * Runs `executor` in one transaction with:
   * - `_START` and `_SUCCESS` audit rows written alongside its changes
   * - the audit context set for query logging
   * - a `_FAILED` row recorded separately when it throws
   */
  async run<T>(
    transactionId: string,
    operation: string,
    userId: string,
    metadata: Record<string, unknown>,
    executor: (scope: RepositoryScope) => Promise<T>,
    options: AuditRunOptions,
  ): Promise<T> {
    const loanId = options.loanId ?? null;
    const context = { transactionId, operation, service: options.service, userId, loanId: options.loanId };

    return this.auditContext.run(context, async () => {
      const startedAt = Date.now();

      try {
        const result = await this.unitOfWork.transaction(async (scope) => {
          await scope.auditLogs.create({ transactionId, operation: `${operation}_START`, loanId, userId, metadata });

          const value = await executor(scope);

          await scope.auditLogs.create({ transactionId, operation: `${operation}_SUCCESS`, loanId, userId, metadata });
          return value;
        });

        this.logger.info({
          service: options.service,
          operation,
          transactionId,
          userId,
          duration: Date.now() - startedAt,
          metadata: { ...metadata, loanId },
        });
        return result;
      } catch (error) {
        const payload = {
          service: options.service,
          operation: `${operation}_FAILED`,
          transactionId,
          userId,
          duration: Date.now() - startedAt,
          metadata: { ...metadata, loanId },
          error: describeError(error),
        };
        // client errors are expected outcomes; anything else is a fault
        if (error instanceof HttpException && error.getStatus() < 500) {
          this.logger.warn(payload);
        } else {
          this.logger.error(payload);
        }

        await this.recordFailure(transactionId, operation, userId, loanId, metadata, error);
        throw error;
      }
    });
  }

  /** Returns the audit trail for a transaction. */
  async getAuditTrail(transactionId: string): Promise<AuditLogEntry[]> {
    return this.unitOfWork.session((scope) => scope.auditLogs.listByTransaction(transactionId));
  }

  async getLoanAuditTrail(loanId: string): Promise<AuditLogEntry[]> {
    return this.unitOfWork.session((scope) => scope.auditLogs.listByLoan(loanId));
  }

  // The failed transaction rolled back its own rows, so the failure is written on its own.
  private async recordFailure(
    transactionId: string,
    operation: string,
    userId: string,
    loanId: string | null,
    metadata: Record<string, unknown>,
    error: unknown,
  ): Promise<void> {
    try {
      await this.unitOfWork.transaction((scope) =>
        scope.auditLogs.create({
          transactionId,
          operation: `${operation}_FAILED`,
          loanId,
          userId,
          metadata: { ...metadata, error: describeError(error).message },
        }),
      );
    } catch (auditError) {
      this.logger.warn({
        service: 'database',
        operation: 'AUDIT_FAILURE_NOT_RECORDED',
        transactionId,
        userId,
        error: describeError(auditError),
      });
    }
  }
}
