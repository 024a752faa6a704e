import { INestApplication, ValidationPipe } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';

import { AppModule } from '../src/app.module';
import { DatabaseService } from '../src/database/database.service';
import { APP_CONFIG, loadAppConfig } from '../src/config/app.config';
import { StructuredLoggerService } from '../src/common/logging/structured-logger.service';
import { HttpExceptionFilter } from '../src/common/filters/http-exception.filter';
import { OutboxProcessor } from '../src/modules/outbox/outbox.processor';
import { InMemoryUnitOfWork } from './support/in-memory-unit-of-work';
import { silentLogger } from './support/silent-logger';
import { buildLoan } from './support/fixtures';

describe('Payments (e2e)', () => {
  let app: INestApplication;
  let unitOfWork: InMemoryUnitOfWork;
  let authToken: string;

  const basePayload = {
    loanId: 'loan-1',
    amount: 100,
    paymentMethod: 'cash',
    branchId: 'branch-1',
  };

  beforeEach(async () => {
    unitOfWork = new InMemoryUnitOfWork();
    unitOfWork.seedLoan(buildLoan());
    unitOfWork.seedCustomer({ id: 'customer-1', totalPaid: 0 });
    unitOfWork.seedItem('item-1', 'collateral');

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(DatabaseService)
      .useValue(unitOfWork)
      .overrideProvider(APP_CONFIG)
      .useValue(loadAppConfig({ JWT_SECRET: 'test-secret', OUTBOX_POLL_INTERVAL_MS: '0' }))
      .overrideProvider(StructuredLoggerService)
      .useValue(silentLogger())
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();

    authToken = await moduleFixture.get(JwtService).signAsync({
      sub: 'e2e-cashier',
      roles: ['payments:write'],
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('rejects requests without a token', async () => {
    await request(app.getHttpServer()).post('/api/payments').send(basePayload).expect(401);
  });

  it('settles a payment and returns the split', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/payments')
      .set('Authorization', `Bearer ${authToken}`)
      .send(basePayload)
      .expect(201);

    expect(res.body.payment).toEqual(
      expect.objectContaining({
        lateFeeAmount: 10,
        interestAmount: 50,
        principalAmount: 40,
        createdBy: 'e2e-cashier',
      }),
    );
    expect(res.body.remainingBalance).toBe(460);
    expect(res.body.isFullyPaid).toBe(false);
  });

  it('validates the payment body', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/payments')
      .set('Authorization', `Bearer ${authToken}`)
      .send({ ...basePayload, amount: 10.555, paymentMethod: 'barter' })
      .expect(400);

    expect(res.body.statusCode).toBe(400);
    expect(Array.isArray(res.body.message)).toBe(true);
    expect(unitOfWork.payments()).toEqual([]);
  });

  it('reports an overpayment with its code', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/payments')
      .set('Authorization', `Bearer ${authToken}`)
      .send({ ...basePayload, amount: 1000 })
      .expect(400);

    expect(res.body).toEqual(
      expect.objectContaining({
        path: '/api/payments',
        statusCode: 400,
        message: 'Payment amount (1000.00) exceeds total owed (560.00)',
        code: 'OVERPAYMENT',
        details: { paymentAmount: 1000, totalOwed: 560 },
      }),
    );
  });

  it('lists, reverses and re-quotes the loan', async () => {
    const server = app.getHttpServer();
    const auth = `Bearer ${authToken}`;

    await request(server).post('/api/payments').set('Authorization', auth).send(basePayload).expect(201);

    const history = await request(server).get('/api/payments').query({ loanId: 'loan-1' }).set('Authorization', auth);
    expect(history.status).toBe(200);
    expect(history.body.map((payment: { id: string }) => payment.id)).toEqual(['payment-1']);

    const reversed = await request(server)
      .post('/api/payments/payment-1/reverse')
      .set('Authorization', auth)
      .send({ reason: 'Entered twice' })
      .expect(200);
    expect(reversed.body).toEqual(
      expect.objectContaining({ status: 'reversed', reversedBy: 'e2e-cashier', reversalReason: 'Entered twice' }),
    );

    const payoff = await request(server).get('/api/loans/loan-1/payoff').set('Authorization', auth).expect(200);
    expect(payoff.body).toEqual({ loanId: 'loan-1', payoff: 560, lateFee: 10, interest: 50, principal: 500 });
  });

  it('returns 409 when reversing twice', async () => {
    const server = app.getHttpServer();
    const auth = `Bearer ${authToken}`;

    await request(server).post('/api/payments').set('Authorization', auth).send(basePayload).expect(201);
    await request(server).post('/api/payments/payment-1/reverse').set('Authorization', auth).send({ reason: 'a' });

    const res = await request(server)
      .post('/api/payments/payment-1/reverse')
      .set('Authorization', auth)
      .send({ reason: 'b' })
      .expect(409);
    expect(res.body.code).toBe('PAYMENT_NOT_REVERSIBLE');
  });

  it('returns 404 for an unknown loan', async () => {
    const res = await request(app.getHttpServer())
      .get('/api/loans/nope')
      .set('Authorization', `Bearer ${authToken}`)
      .expect(404);

    expect(res.body).toEqual(expect.objectContaining({ message: 'Loan nope not found', code: 'LOAN_NOT_FOUND' }));
  });

  it('applies the customer total once the outbox is drained', async () => {
    await request(app.getHttpServer())
      .post('/api/payments')
      .set('Authorization', `Bearer ${authToken}`)
      .send({ ...basePayload, amount: 60.5 })
      .expect(201);
    expect(unitOfWork.customer('customer-1')?.totalPaid).toBe(0);

    await expect(app.get(OutboxProcessor).processBatch()).resolves.toBe(1);

    expect(unitOfWork.customer('customer-1')?.totalPaid).toBe(60.5);
  });
});
