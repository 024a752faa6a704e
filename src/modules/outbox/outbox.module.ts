import { Module } from '@nestjs/common';
import { OutboxProcessor } from './outbox.processor';
import { CustomersModule } from '../customers/customers.module';

@Module({
  imports: [CustomersModule],
  providers: [OutboxProcessor],
  exports: [OutboxProcessor],
})
export class OutboxModule {}
