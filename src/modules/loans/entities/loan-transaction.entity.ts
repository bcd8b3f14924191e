import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { Money } from '../../../common/money/money';
import { moneyTransformer } from '../../../common/money/money.transformer';
import type { LoanTransactionKind } from '../../../common/utils/constants/transaction-kinds.constants';

/** Append-only loan ledger row. `amount` is always the positive magnitude. */
@Entity('loan_transactions')
export class LoanTransaction {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Index()
  @Column({ name: 'loan_id', type: 'varchar', length: 36 })
  loanId!: string;

  @Column({ type: 'decimal', precision: 14, scale: 2, transformer: moneyTransformer })
  amount!: Money;

  @Column({ type: 'varchar', length: 32 })
  kind!: LoanTransactionKind;

  @Column({ name: 'period_index', type: 'int', nullable: true })
  periodIndex!: number | null;

  @Column({ type: 'text' })
  note!: string;

  @Column({ name: 'effective_date', type: 'date' })
  effectiveDate!: string;

  @CreateDateColumn({ name: 'recorded_at' })
  recordedAt!: Date;
}
