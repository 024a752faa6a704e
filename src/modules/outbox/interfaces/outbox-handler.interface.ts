import { RepositoryScope } from '../../../database/repository-scope';
import { OutboxMessage } from './outbox.interface';

/**
 * Applies one outbox message. Runs inside the transaction that marks the
 * message processed, so its writes and the acknowledgement commit together.
 */
export interface OutboxHandler {
  readonly eventType: string;
  handle(message: OutboxMessage, scope: RepositoryScope): Promise<void>;
}
