import 'reflect-metadata';
import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env file before anything else
config({ path: resolve(__dirname, '../../.env') });

import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { APP_CONFIG, AppConfig } from './config/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new HttpExceptionFilter());

  // Swagger config
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Pawn Loan Settlement API')
      .setDescription('Payment settlement, reversal and loan balance queries')
      .setVersion('1.0')
      .addTag('payments', 'Settle, reverse and list payments')
      .addTag('loans', 'Loan balances, payoff and audit trail')
      .addBearerAuth(
        {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
          in: 'header',
        },
        'bearer',
      )
      .addSecurityRequirements('bearer')
      .build(),
  );
  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
    },
  });

  const appConfig = app.get<AppConfig>(APP_CONFIG);
  await app.listen(appConfig.port);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start settlement service', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
