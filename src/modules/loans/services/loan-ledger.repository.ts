import { Injectable, NotFoundException } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { writeLock } from '../../../database/locking';
import { LoanTransaction } from '../entities/loan-transaction.entity';
import { Loan } from '../entities/loan.entity';
import { LedgerStep, LoanLedgerState } from '../interfaces/loan-ledger.interface';
import { applyLedgerState, toLedgerState, toTransactionRows } from '../loan-state.mapper';

/**
 * Reads and writes loan aggregates inside a caller-owned transaction. A step
 * is always committed as the loan row plus its ledger entries together.
 */
@Injectable()
export class LoanLedgerRepository {
  async loadForUpdate(manager: EntityManager, loanId: string): Promise<Loan> {
    const loan = await manager.findOne(Loan, {
      where: { id: loanId },
      ...writeLock<Loan>(manager),
    });
    if (!loan) throw new NotFoundException(`Loan ${loanId} not found`);
    return loan;
  }

  toState(loan: Loan): LoanLedgerState {
    return toLedgerState(loan);
  }

  async commit(manager: EntityManager, loan: Loan, step: LedgerStep): Promise<Loan> {
    applyLedgerState(loan, step.state);
    const saved = await manager.save(Loan, loan);
    if (step.entries.length > 0) {
      await manager.save(LoanTransaction, toTransactionRows(loan.id, step.entries));
    }
    return saved;
  }

  async history(manager: EntityManager, loanId: string): Promise<LoanTransaction[]> {
    // ids are handed out under the loan lock; recorded_at is the transaction start on postgres
    return manager.find(LoanTransaction, {
      where: { loanId },
      order: { id: 'ASC' },
    });
  }
}
