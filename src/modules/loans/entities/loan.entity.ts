import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import Decimal from 'decimal.js';
import { Money } from '../../../common/money/money';
import { moneyTransformer } from '../../../common/money/money.transformer';

const rateTransformer = {
  to: (value: Decimal | null | undefined) => (value instanceof Decimal ? value.toFixed(4) : value),
  from: (value: string | number | null) => (value === null ? null : new Decimal(value)),
};

// one active loan per member
@Index('uq_loans_active_member', ['memberId'], { unique: true, where: '"is_active" = true' })
@Entity('loans')
export class Loan {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Index()
  @Column({ name: 'member_id', type: 'varchar', length: 36 })
  memberId!: string;

  @Column({ type: 'decimal', precision: 14, scale: 2, transformer: moneyTransformer })
  principal!: Money;

  @Column({
    name: 'interest_rate',
    type: 'decimal',
    precision: 5,
    scale: 4,
    transformer: rateTransformer,
  })
  interestRate!: Decimal;

  @Column({
    name: 'interest_amount',
    type: 'decimal',
    precision: 14,
    scale: 2,
    transformer: moneyTransformer,
  })
  interestAmount!: Money;

  @Column({
    name: 'total_amount',
    type: 'decimal',
    precision: 14,
    scale: 2,
    transformer: moneyTransformer,
  })
  totalAmount!: Money;

  @Column({
    name: 'current_balance',
    type: 'decimal',
    precision: 14,
    scale: 2,
    transformer: moneyTransformer,
  })
  currentBalance!: Money;

  @Column({ name: 'issue_date', type: 'date' })
  issueDate!: string;

  @Index()
  @Column({ name: 'next_due_date', type: 'date' })
  nextDueDate!: string;

  @Index()
  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ name: 'closed_on', type: 'date', nullable: true })
  closedOn!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
