import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';

export type LedgerKind = 'topup' | 'hold' | 'charge' | 'release';

// Запись о движении токенов пользователя
@Entity({ name: 'ledger_entries' })
export class LedgerEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'varchar', length: 32 })
  userId!: string;

  @Column({ type: 'varchar', length: 16 })
  kind!: LedgerKind;

  @Column({ type: 'integer' })
  amount!: number;

  // Уникальная ссылка операции, например job:<id>:hold; повтор операции с той же ссылкой игнорируется
  @Column({ type: 'varchar', length: 128, unique: true })
  ref!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
