import 'reflect-metadata';
import { config } from 'dotenv';
import { resolve } from 'path';

config({ path: resolve(__dirname, '../../.env') });

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { parseIsoDate, today } from '../src/common/utils/dates.util';
import { OverdueService } from '../src/modules/overdue/overdue.service';

// Usage: npm run overdue:process -- 2024-03-06
async function main() {
  const [dateArg] = process.argv.slice(2);
  const asOfDate = dateArg ? parseIsoDate(dateArg) : today();

  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const report = await app.get(OverdueService).processAllOverdue(asOfDate, 'batch');
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    if (report.failures.length > 0) process.exitCode = 1;
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  Logger.error('Overdue processing failed', error instanceof Error ? error.stack : String(error), 'ProcessOverdue');
  process.exit(1);
});
