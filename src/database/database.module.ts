import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { UnitOfWork } from './unit-of-work';

@Global()
@Module({
  providers: [DatabaseService, { provide: UnitOfWork, useExisting: DatabaseService }],
  exports: [UnitOfWork],
})
export class DatabaseModule {}
