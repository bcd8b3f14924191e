import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { Money } from '../../../common/money/money';
import { moneyTransformer } from '../../../common/money/money.transformer';
import type { SavingsTransactionKind } from '../../../common/utils/constants/transaction-kinds.constants';

@Entity('savings_transactions')
export class SavingsTransaction {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Index()
  @Column({ name: 'member_id', type: 'varchar', length: 36 })
  memberId!: string;

  @Column({ type: 'decimal', precision: 14, scale: 2, transformer: moneyTransformer })
  amount!: Money;

  @Column({ type: 'varchar', length: 32 })
  kind!: SavingsTransactionKind;

  @Column({ type: 'text' })
  note!: string;

  @Column({ name: 'effective_date', type: 'date' })
  effectiveDate!: string;

  @CreateDateColumn({ name: 'recorded_at' })
  recordedAt!: Date;
}
