// src/modules/repayments/repayments.module.ts
import { Module } from '@nestjs/common';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { AuditModule } from '../audit/audit.module';
import { LoansModule } from '../loans/loans.module';
import { RepaymentsController } from './repayments.controller';
import { RepaymentsService } from './repayments.service';

@Module({
  imports: [AuditModule, LoansModule],
  controllers: [RepaymentsController],
  providers: [RepaymentsService, LoggingInterceptor],
})
export class RepaymentsModule {}
