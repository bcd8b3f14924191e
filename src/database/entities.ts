import { AuditLog } from '../modules/audit/entities/audit-log.entity';
import { LoanTransaction } from '../modules/loans/entities/loan-transaction.entity';
import { Loan } from '../modules/loans/entities/loan.entity';
import { Member } from '../modules/members/entities/member.entity';
import { SavingsTransaction } from '../modules/savings/entities/savings-transaction.entity';

export const LEDGER_ENTITIES = [Member, SavingsTransaction, Loan, LoanTransaction, AuditLog];
