import 'reflect-metadata';
import { config } from 'dotenv';
import { resolve } from 'path';

// .env at the repository root, two levels above dist/src
config({ path: resolve(__dirname, '../../.env') });

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Savings & Loan Ledger API')
    .setDescription('Member savings, loans, repayments and overdue interest')
    .setVersion('1.0')
    .addTag('members', 'Member registry')
    .addTag('savings', 'Savings payments and history')
    .addTag('loans', 'Loan issuance and ledgers')
    .addTag('repayments', 'Repayment operations')
    .addTag('overdue', 'Overdue interest processing')
    .addTag('reports', 'Dashboard totals')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
