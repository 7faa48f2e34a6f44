import { Column, CreateDateColumn, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import { JobStatus } from '../constants/job-status.enum';

// Задача генерации, созданная по запросу пользователя
@Entity({ name: 'generation_jobs' })
export class GenerationJob {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  // ID задачи у провайдера, появляется после ответа createTask
  @Column({ name: 'task_id', type: 'varchar', length: 128, nullable: true, unique: true })
  taskId!: string | null;

  // Telegram выдаёт id больше 2^31, поэтому храним строкой
  @Column({ name: 'user_id', type: 'varchar', length: 32 })
  userId!: string;

  @Column({ name: 'chat_id', type: 'varchar', length: 32 })
  chatId!: string;

  @Column({ type: 'varchar', length: 128 })
  model!: string;

  @Column({ type: 'simple-json' })
  input!: Record<string, unknown>;

  @Column({ type: 'varchar', length: 16 })
  status!: JobStatus;

  @Column({ name: 'result_urls', type: 'simple-json' })
  resultUrls!: string[];

  @Column({ name: 'error_text', type: 'text', nullable: true })
  errorText!: string | null;

  // Сколько токенов заморожено под задачу
  @Column({ type: 'integer', default: 0 })
  price!: number;

  @Column({ name: 'idempotency_key', type: 'varchar', length: 128, nullable: true, unique: true })
  idempotencyKey!: string | null;

  @Column({ type: 'boolean', default: false })
  delivered!: boolean;

  @Column({ name: 'delivered_at', type: Date, nullable: true })
  deliveredAt!: Date | null;

  @Column({ name: 'delivery_attempts', type: 'integer', default: 0 })
  deliveryAttempts!: number;

  @Column({ name: 'last_delivery_error', type: 'text', nullable: true })
  lastDeliveryError!: string | null;

  // Пока срок не истёк, результат отправляет тот, кто захватил доставку
  @Column({ name: 'delivery_claimed_until', type: Date, nullable: true })
  deliveryClaimedUntil!: Date | null;

  // Сколько ссылок из resultUrls уже ушло в чат
  @Column({ name: 'sent_count', type: 'integer', default: 0 })
  sentCount!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @Column({ name: 'finished_at', type: Date, nullable: true })
  finishedAt!: Date | null;
}
