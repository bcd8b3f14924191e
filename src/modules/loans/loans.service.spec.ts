import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { QueryFailedError } from 'typeorm';
import { ConflictError, ValidationError } from '../../common/errors/ledger.errors';
import { Money } from '../../common/money/money';
import { parseIsoDate } from '../../common/utils/dates.util';
import { createLedgerTestDoubles, ledgerProviders, LedgerTestDoubles } from '../../testing/ledger-mocks';
import { LoanTransaction } from './entities/loan-transaction.entity';
import { Loan } from './entities/loan.entity';
import { LoanService } from './loans.service';
import { LoanCalculationService } from './services/loan-calculation.service';
import { LoanLedgerRepository } from './services/loan-ledger.repository';

describe('LoanService', () => {
  let service: LoanService;
  let doubles: LedgerTestDoubles;

  beforeEach(async () => {
    doubles = createLedgerTestDoubles('loan');

    const module = await Test.createTestingModule({
      providers: [
        LoanService,
        LoanCalculationService,
        LoanLedgerRepository,
        ...ledgerProviders(doubles),
      ],
    }).compile();

    service = module.get(LoanService);
  });

  // -----------------------------------------------------
  // ISSUE
  // -----------------------------------------------------
  it('issues a loan with interest added up front', async () => {
    doubles.manager.findOne.mockResolvedValue({ id: 'member-1' });

    const loan = await service.issueLoan('member-1', Money.of('10000.00'), parseIsoDate('2024-01-10'));

    expect(loan.memberId).toBe('member-1');
    expect(loan.principal.toFixed()).toBe('10000.00');
    expect(loan.interestAmount.toFixed()).toBe('2000.00');
    expect(loan.currentBalance.toFixed()).toBe('12000.00');
    expect(loan.issueDate).toBe('2024-01-10');
    expect(loan.nextDueDate).toBe('2024-02-05');
    expect(loan.isActive).toBe(true);

    expect(doubles.auditService.run).toHaveBeenCalledWith(
      expect.stringMatching(/^txn_/),
      'LOAN_ISSUE',
      'system',
      expect.objectContaining({ subjectId: loan.id, memberId: 'member-1', asOfDate: '2024-01-10' }),
      expect.any(Function),
    );
    expect(doubles.manager.save).toHaveBeenNthCalledWith(2, LoanTransaction, [
      expect.objectContaining({ loanId: loan.id, kind: 'loan_issued', effectiveDate: '2024-01-10' }),
    ]);
    expect(doubles.structuredLogger.log).toHaveBeenCalledWith(
      expect.objectContaining({
        level: 'info',
        service: 'loan',
        metadata: expect.objectContaining({ event: 'loan_issued', memberId: 'member-1' }),
      }),
    );
  });

  it('refuses a second active loan for the same member once the member is locked', async () => {
    doubles.manager.findOne.mockResolvedValue({ id: 'member-1' });
    doubles.manager.exists.mockResolvedValue(true);

    await expect(
      service.issueLoan('member-1', Money.of('500.00'), parseIsoDate('2024-01-10')),
    ).rejects.toThrow(new ConflictError('Active loan exists'));

    expect(doubles.manager.exists).toHaveBeenCalledWith(Loan, {
      where: { memberId: 'member-1', isActive: true },
    });
    expect(doubles.manager.save).not.toHaveBeenCalled();
  });

  it('reports a lost race on the active-loan index as a conflict', async () => {
    doubles.manager.findOne.mockResolvedValue({ id: 'member-1' });
    doubles.manager.save.mockRejectedValueOnce(
      new QueryFailedError('INSERT INTO "loans"', [], Object.assign(new Error('duplicate key'), { code: '23505' })),
    );

    await expect(
      service.issueLoan('member-1', Money.of('500.00'), parseIsoDate('2024-01-10')),
    ).rejects.toThrow(new ConflictError('Active loan exists'));
  });

  it('fails for an unknown member', async () => {
    doubles.manager.findOne.mockResolvedValue(null);

    await expect(
      service.issueLoan('missing', Money.of('500.00'), parseIsoDate('2024-01-10')),
    ).rejects.toThrow(new NotFoundException('Member missing not found'));
  });

  it('validates the principal before opening a transaction', async () => {
    await expect(
      service.issueLoan('member-1', Money.zero(), parseIsoDate('2024-01-10')),
    ).rejects.toThrow(ValidationError);

    expect(doubles.auditService.run).not.toHaveBeenCalled();
  });

  // -----------------------------------------------------
  // READS
  // -----------------------------------------------------
  it('throws NotFoundException for an unknown loan', async () => {
    doubles.repository.findOne.mockResolvedValue(null);

    await expect(service.getLoan('nope')).rejects.toThrow(NotFoundException);
  });

  it('lists loans filtered by member', async () => {
    await service.listLoans('member-1');

    expect(doubles.repository.find).toHaveBeenCalledWith({
      where: { memberId: 'member-1' },
      order: { issueDate: 'ASC', createdAt: 'ASC' },
    });
  });

  it('reconciles the ledger against the cached balance', async () => {
    doubles.repository.findOne.mockResolvedValue({ id: 'loan-1', currentBalance: Money.of('10800.00') });
    doubles.manager.find.mockResolvedValue([
      { kind: 'loan_issued', amount: Money.of('12000.00') },
      { kind: 'repayment', amount: Money.of('3000.00') },
      { kind: 'overdue_interest', amount: Money.of('1800.00') },
    ]);

    const view = await service.getLoanLedger('loan-1');

    expect(view.replayedBalance.toFixed()).toBe('10800.00');
    expect(view.inBalance).toBe(true);
    expect(doubles.manager.find).toHaveBeenCalledWith(LoanTransaction, {
      where: { loanId: 'loan-1' },
      order: { id: 'ASC' },
    });
  });

  it('returns the audit trail of an existing loan', async () => {
    doubles.repository.findOne.mockResolvedValue({ id: 'loan-1' });

    await service.getAuditTrail('loan-1');

    expect(doubles.auditService.getAuditTrail).toHaveBeenCalledWith('loan-1');
  });
});
