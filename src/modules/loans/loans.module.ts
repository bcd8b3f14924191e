import { Module } from '@nestjs/common';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { AuditModule } from '../audit/audit.module';
import { LoansController } from './loans.controller';
import { LoanService } from './loans.service';
import { LoanCalculationService } from './services/loan-calculation.service';
import { LoanLedgerRepository } from './services/loan-ledger.repository';

@Module({
  imports: [AuditModule],
  controllers: [LoansController],
  providers: [LoanService, LoanCalculationService, LoanLedgerRepository, LoggingInterceptor],
  exports: [LoanService, LoanCalculationService, LoanLedgerRepository],
})
export class LoansModule {}
