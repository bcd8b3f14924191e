// src/modules/reports/reports.service.ts
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { Money } from '../../common/money/money';
import { toIsoDate } from '../../common/utils/dates.util';
import { Loan } from '../loans/entities/loan.entity';
import { Member } from '../members/entities/member.entity';
import { Dashboard } from './interfaces/dashboard.interface';

@Injectable()
export class ReportsService {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  /**
   * Totals are summed in Money rather than in SQL so both drivers round the
   * same way.
   */
  async getDashboard(asOfDate: Date): Promise<Dashboard> {
    const asOfIso = toIsoDate(asOfDate);
    const members = await this.dataSource.getRepository(Member).find({
      select: { id: true, savingsBalance: true },
    });
    const loans = await this.dataSource.getRepository(Loan).find({
      where: { isActive: true },
      select: { id: true, currentBalance: true, nextDueDate: true },
    });

    return {
      asOfDate: asOfIso,
      totalMembers: members.length,
      totalSavings: Money.sum(members.map((member) => member.savingsBalance)),
      activeLoans: loans.length,
      // yyyy-MM-dd strings order the same as the dates
      overdueLoans: loans.filter((loan) => loan.nextDueDate < asOfIso).length,
      outstandingBalance: Money.sum(loans.map((loan) => loan.currentBalance)),
    };
  }
}
