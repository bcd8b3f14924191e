// src/modules/members/members.module.ts
import { Module } from '@nestjs/common';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { AuditModule } from '../audit/audit.module';
import { LoansModule } from '../loans/loans.module';
import { SavingsModule } from '../savings/savings.module';
import { MembersController } from './members.controller';
import { MembersService } from './members.service';

@Module({
  imports: [AuditModule, LoansModule, SavingsModule],
  controllers: [MembersController],
  providers: [MembersService, LoggingInterceptor],
  exports: [MembersService],
})
export class MembersModule {}
