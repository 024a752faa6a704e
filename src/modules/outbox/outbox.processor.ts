import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { UnitOfWork } from '../../database/unit-of-work';
import { RepositoryScope } from '../../database/repository-scope';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { describeError, StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { CustomerStatsHandler } from '../customers/customer-stats.handler';
import { OutboxHandler } from './interfaces/outbox-handler.interface';
import { OutboxMessage } from './interfaces/outbox.interface';

type ProcessOutcome = 'processed' | 'failed' | 'empty';

@Injectable()
export class OutboxProcessor implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly handlers = new Map<string, OutboxHandler>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly logger: StructuredLoggerService,
    customerStats: CustomerStatsHandler,
  ) {
    this.handlers.set(customerStats.eventType, customerStats);
  }

  onApplicationBootstrap() {
    if (this.config.outbox.pollIntervalMs > 0) this.start();
  }

  onModuleDestroy() {
    this.stop();
  }

  start() {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.outbox.pollIntervalMs);
    this.timer.unref();

    this.logger.info({
      service: 'outbox',
      operation: 'POLLING_STARTED',
      metadata: { intervalMs: this.config.outbox.pollIntervalMs },
    });
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Handles up to OUTBOX_BATCH_SIZE messages, one transaction each, and returns
   * how many were processed. Stops early when the outbox is drained or a message fails.
   */
  async processBatch(): Promise<number> {
    let processed = 0;

    for (let i = 0; i < this.config.outbox.batchSize; i++) {
      const outcome = await this.processNext();
      if (outcome !== 'processed') break;
      processed++;
    }
    return processed;
  }

  private async tick(): Promise<void> {
    // a slow batch must not overlap the next interval
    if (this.running) return;
    this.running = true;

    try {
      await this.processBatch();
    } catch (error) {
      this.logger.error({ service: 'outbox', operation: 'BATCH_FAILED', error: describeError(error) });
    } finally {
      this.running = false;
    }
  }

  private async processNext(): Promise<ProcessOutcome> {
    const claim: { message: OutboxMessage | null } = { message: null };

    try {
      return await this.unitOfWork.transaction<ProcessOutcome>(async (scope) => {
        const message = await scope.outbox.claimNext(this.config.outbox.maxAttempts);
        if (!message) return 'empty';
        claim.message = message;

        await this.dispatch(message, scope);
        await scope.outbox.markProcessed(message.id);
        return 'processed';
      });
    } catch (error) {
      if (!claim.message) throw error;

      await this.recordFailure(claim.message, error);
      return 'failed';
    }
  }

  private async dispatch(message: OutboxMessage, scope: RepositoryScope): Promise<void> {
    const handler = this.handlers.get(message.eventType);
    if (!handler) {
      throw new Error(`No handler registered for outbox event "${message.eventType}"`);
    }
    await handler.handle(message, scope);
  }

  private async recordFailure(message: OutboxMessage, error: unknown): Promise<void> {
    const described = describeError(error);

    await this.unitOfWork.transaction((scope) => scope.outbox.recordFailure(message.id, described.message));

    this.logger.warn({
      service: 'outbox',
      operation: 'MESSAGE_FAILED',
      metadata: {
        messageId: message.id,
        eventType: message.eventType,
        attempt: message.attemptCount + 1,
        maxAttempts: this.config.outbox.maxAttempts,
      },
      error: described,
    });
  }
}
