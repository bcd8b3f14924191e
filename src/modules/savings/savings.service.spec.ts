import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ValidationError } from '../../common/errors/ledger.errors';
import { Money } from '../../common/money/money';
import { parseIsoDate } from '../../common/utils/dates.util';
import { buildMember } from '../../testing/fixtures';
import { createLedgerTestDoubles, ledgerProviders, LedgerTestDoubles } from '../../testing/ledger-mocks';
import { Member } from '../members/entities/member.entity';
import { SavingsTransaction } from './entities/savings-transaction.entity';
import { SavingsService } from './savings.service';

describe('SavingsService', () => {
  let service: SavingsService;
  let doubles: LedgerTestDoubles;

  beforeEach(async () => {
    doubles = createLedgerTestDoubles('savings');

    const module = await Test.createTestingModule({
      providers: [SavingsService, ...ledgerProviders(doubles)],
    }).compile();

    service = module.get(SavingsService);
  });

  it('records a subscription and grows the balance', async () => {
    doubles.manager.findOne.mockResolvedValue(buildMember());

    const result = await service.recordSavingsPayment(
      'member-1',
      Money.of('500.00'),
      parseIsoDate('2024-02-01'),
    );

    expect(result.savingsBalance.toFixed()).toBe('1500.00');
    expect(doubles.manager.save).toHaveBeenCalledWith(
      Member,
      expect.objectContaining({ id: 'member-1' }),
    );
    expect(doubles.manager.create).toHaveBeenCalledWith(SavingsTransaction, {
      memberId: 'member-1',
      amount: Money.of('500.00'),
      kind: 'subscription',
      note: 'Monthly subscription',
      effectiveDate: '2024-02-01',
    });
    expect(doubles.auditService.run).toHaveBeenCalledWith(
      expect.any(String),
      'SAVINGS_PAYMENT',
      'system',
      expect.objectContaining({ subjectId: 'member-1', kind: 'subscription' }),
      expect.any(Function),
    );
  });

  it('keeps a caller note', async () => {
    doubles.manager.findOne.mockResolvedValue(buildMember());

    const result = await service.recordSavingsPayment(
      'member-1',
      Money.of('250.00'),
      parseIsoDate('2024-02-01'),
      'subscription',
      'February top-up',
    );

    expect(result.transaction.note).toBe('February top-up');
  });

  it('rejects a payment that would overflow the stored balance', async () => {
    doubles.manager.findOne.mockResolvedValue(
      buildMember({ savingsBalance: Money.of('999999999999.00') }),
    );

    await expect(
      service.recordSavingsPayment('member-1', Money.of('500.00'), parseIsoDate('2024-02-01')),
    ).rejects.toThrow(
      new ValidationError('Savings balance would exceed the maximum of 999999999999.99'),
    );
    expect(doubles.manager.save).not.toHaveBeenCalled();
  });

  it('rejects non-positive amounts', async () => {
    await expect(
      service.recordSavingsPayment('member-1', Money.zero(), parseIsoDate('2024-02-01')),
    ).rejects.toThrow(new ValidationError('Savings amount must be greater than zero'));
    expect(doubles.auditService.run).not.toHaveBeenCalled();
  });

  it('fails for an unknown member', async () => {
    doubles.manager.findOne.mockResolvedValue(null);

    await expect(
      service.recordSavingsPayment('missing', Money.of('1.00'), parseIsoDate('2024-02-01')),
    ).rejects.toThrow(new NotFoundException('Member missing not found'));
  });

  it('exposes the monthly subscription from the policy', () => {
    expect(service.monthlySubscription.toFixed()).toBe('500.00');
  });

  it('reads savings history in write order', async () => {
    await service.getSavingsHistory('member-1');

    expect(doubles.repository.find).toHaveBeenCalledWith({
      where: { memberId: 'member-1' },
      order: { id: 'ASC' },
    });
  });

  it('refuses history for an unknown member', async () => {
    doubles.repository.exists.mockResolvedValue(false);

    await expect(service.getSavingsHistory('missing')).rejects.toThrow(NotFoundException);
  });
});
