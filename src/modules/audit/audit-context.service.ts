// src/modules/audit/audit-context.service.ts
import { AsyncLocalStorage } from 'node:async_hooks';
import { Injectable } from '@nestjs/common';
import { AuditContext } from './interfaces/audit-context.interface';

@Injectable()
export class AuditContextService {
  private readonly storage = new AsyncLocalStorage<AuditContext>();

  run<T>(context: AuditContext, callback: () => Promise<T>): Promise<T> {
    return this.storage.run(context, callback);
  }

  getContext(): AuditContext | undefined {
    return this.storage.getStore();
  }
}
