import { Column, CreateDateColumn, Entity, Index, PrimaryColumn } from 'typeorm';
import { Money } from '../../../common/money/money';
import { moneyTransformer } from '../../../common/money/money.transformer';

@Entity('members')
export class Member {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Index({ unique: true })
  @Column({ name: 'member_number', type: 'varchar', length: 50 })
  memberNumber!: string;

  @Column({ name: 'full_name', type: 'varchar', length: 200 })
  fullName!: string;

  @Column({ name: 'joined_on', type: 'date' })
  joinedOn!: string;

  @Column({
    name: 'savings_balance',
    type: 'decimal',
    precision: 14,
    scale: 2,
    transformer: moneyTransformer,
  })
  savingsBalance!: Money;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
