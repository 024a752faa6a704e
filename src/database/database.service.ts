import { HttpException, Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { DatabaseError, Pool, PoolClient, QueryResult, QueryResultRow, types } from 'pg';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { describeError, StructuredLoggerService } from '../common/logging/structured-logger.service';
import { AuditContextService } from '../modules/audit/audit-context.service';
import { ConcurrencyConflictException, PersistenceException } from '../common/errors/settlement.errors';
import { createRepositoryScope, RepositoryScope } from './repository-scope';
import { SqlExecutor } from './sql-executor';
import { UnitOfWork } from './unit-of-work';

const DATE_OID = 1082;

// serialization_failure, deadlock_detected, lock_not_available
const CONFLICT_SQLSTATES = new Set(['40001', '40P01', '55P03']);

// Due dates are calendar dates; keep them as 'YYYY-MM-DD' instead of local-midnight Dates.
types.setTypeParser(DATE_OID, (value: string) => value);

@Injectable()
export class DatabaseService extends UnitOfWork implements OnModuleInit, OnModuleDestroy {
  private readonly pool: Pool;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly logger: StructuredLoggerService,
    private readonly context: AuditContextService,
  ) {
    super();
    this.pool = new Pool({
      connectionString: config.database.url,
      max: config.database.poolMax,
    });

    this.pool.on('error', (error) => {
      this.logger.error({
        service: 'database',
        operation: 'POOL_IDLE_CLIENT_ERROR',
        error: describeError(error),
      });
    });
  }

  async onModuleInit() {
    await this.pool.query('SELECT 1');
    this.logger.info({
      service: 'database',
      operation: 'CONNECTED',
      metadata: { poolMax: this.config.database.poolMax },
    });
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  async transaction<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    let releaseError: Error | undefined;

    try {
      await client.query('BEGIN');
      // SET does not take bind parameters; the value is a validated integer.
      await client.query(`SET LOCAL lock_timeout = ${this.config.database.lockTimeoutMs}`);

      const result = await work(createRepositoryScope(this.instrument(client)));

      await client.query('COMMIT');
      return result;
    } catch (error) {
      releaseError = await this.rollback(client);
      throw this.translate(error);
    } finally {
      client.release(releaseError);
    }
  }

  async session<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    try {
      return await work(createRepositoryScope(this.instrument(client)));
    } catch (error) {
      throw this.translate(error);
    } finally {
      client.release();
    }
  }

  private async acquire(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new PersistenceException('Could not acquire a database connection', { cause: error });
    }
  }

  /** Returns the error to hand to `release` so a broken connection is discarded. */
  private async rollback(client: PoolClient): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (error) {
      this.logger.error({
        service: 'database',
        operation: 'ROLLBACK_FAILED',
        transactionId: this.context.getContext()?.transactionId,
        error: describeError(error),
      });
      return error instanceof Error ? error : new Error(String(error));
    }
  }

  private translate(error: unknown): unknown {
    if (error instanceof HttpException) return error;

    if (error instanceof DatabaseError && error.code && CONFLICT_SQLSTATES.has(error.code)) {
      return new ConcurrencyConflictException(undefined, { cause: error });
    }
    return new PersistenceException(undefined, { cause: error });
  }

  /** Every statement run under an audit context is logged at debug level. */
  private instrument(client: PoolClient): SqlExecutor {
    const logger = this.logger;
    const context = this.context;

    return {
      async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
        const startedAt = Date.now();
        const result = await client.query<R>(text, values);

        const ctx = context.getContext();
        if (ctx) {
          logger.debug({
            service: ctx.service,
            operation: ctx.operation,
            transactionId: ctx.transactionId,
            userId: ctx.userId,
            duration: Date.now() - startedAt,
            metadata: { query: text, params: values, rowCount: result.rowCount },
          });
        }
        return result;
      },
    };
  }
}
