import { Test } from '@nestjs/testing';
import { Money } from '../../common/money/money';
import { parseIsoDate } from '../../common/utils/dates.util';
import { buildLoan, buildMember } from '../../testing/fixtures';
import { createLedgerTestDoubles, ledgerProviders } from '../../testing/ledger-mocks';
import { ReportsService } from './reports.service';

describe('ReportsService', () => {
  it('totals savings and active loan balances as of a date', async () => {
    const doubles = createLedgerTestDoubles();
    doubles.repository.find
      .mockResolvedValueOnce([
        buildMember({ savingsBalance: Money.of('1500.00') }),
        buildMember({ id: 'member-2', savingsBalance: Money.of('1000.50') }),
      ])
      .mockResolvedValueOnce([
        buildLoan({ currentBalance: Money.of('9000.00'), nextDueDate: '2024-03-05' }),
        buildLoan({ id: 'loan-2', currentBalance: Money.of('2400.00'), nextDueDate: '2024-04-05' }),
      ]);

    const module = await Test.createTestingModule({
      providers: [ReportsService, ...ledgerProviders(doubles)],
    }).compile();

    const dashboard = await module.get(ReportsService).getDashboard(parseIsoDate('2024-03-10'));

    expect(dashboard.asOfDate).toBe('2024-03-10');
    expect(dashboard.totalMembers).toBe(2);
    expect(dashboard.totalSavings.toFixed()).toBe('2500.50');
    expect(dashboard.activeLoans).toBe(2);
    expect(dashboard.overdueLoans).toBe(1);
    expect(dashboard.outstandingBalance.toFixed()).toBe('11400.00');
  });
});
