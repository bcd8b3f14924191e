import { Module } from '@nestjs/common';
import { LoggingModule } from './common/logging/logging.module';
import { LedgerConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { AuditModule } from './modules/audit/audit.module';
import { LoansModule } from './modules/loans/loans.module';
import { MembersModule } from './modules/members/members.module';
import { OverdueModule } from './modules/overdue/overdue.module';
import { RepaymentsModule } from './modules/repayments/repayments.module';
import { ReportsModule } from './modules/reports/reports.module';
import { SavingsModule } from './modules/savings/savings.module';

@Module({
  imports: [
    LedgerConfigModule,
    LoggingModule,
    DatabaseModule,
    AuditModule,
    MembersModule,
    SavingsModule,
    LoansModule,
    RepaymentsModule,
    OverdueModule,
    ReportsModule,
  ],
})
export class AppModule {}
