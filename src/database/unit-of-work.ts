import { RepositoryScope } from './repository-scope';

/**
 * Injection token and contract for running work against the stores.
 */
export abstract class UnitOfWork {
  /** Runs `work` inside one transaction; a thrown error rolls every write back. */
  abstract transaction<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T>;

  /** Runs `work` on a single connection in autocommit mode. */
  abstract session<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T>;
}
