// src/modules/overdue/overdue.module.ts
import { Module } from '@nestjs/common';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { AuditModule } from '../audit/audit.module';
import { LoansModule } from '../loans/loans.module';
import { OverdueController } from './overdue.controller';
import { OverdueService } from './overdue.service';

@Module({
  imports: [AuditModule, LoansModule],
  controllers: [OverdueController],
  providers: [OverdueService, LoggingInterceptor],
  exports: [OverdueService],
})
export class OverdueModule {}
