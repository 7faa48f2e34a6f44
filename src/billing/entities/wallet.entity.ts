import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

// Баланс токенов пользователя; hold: часть баланса, замороженная под незавершённые задачи
@Entity({ name: 'wallets' })
export class Wallet {
  @PrimaryColumn({ name: 'user_id', type: 'varchar', length: 32 })
  userId!: string;

  @Column({ type: 'integer', default: 0 })
  balance!: number;

  @Column({ type: 'integer', default: 0 })
  hold!: number;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
