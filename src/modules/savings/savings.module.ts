// src/modules/savings/savings.module.ts
import { Module } from '@nestjs/common';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { AuditModule } from '../audit/audit.module';
import { SavingsController } from './savings.controller';
import { SavingsService } from './savings.service';

@Module({
  imports: [AuditModule],
  controllers: [SavingsController],
  providers: [SavingsService, LoggingInterceptor],
  exports: [SavingsService],
})
export class SavingsModule {}
