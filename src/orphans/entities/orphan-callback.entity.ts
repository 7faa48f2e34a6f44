import { Column, Entity, PrimaryColumn } from 'typeorm';
import { CallbackStatus, KieCallbackOutcome } from '../../kie/kie-callback.parser';

export type OrphanOutcome = 'matched' | 'expired';

// Callback провайдера, для которого на момент получения не нашлось задачи
@Entity({ name: 'orphan_callbacks' })
export class OrphanCallback {
  @PrimaryColumn({ name: 'task_id', type: 'varchar', length: 128 })
  taskId!: string;

  // копия payload.status для условных UPDATE
  @Column({ type: 'varchar', length: 16, default: 'running' })
  status!: CallbackStatus;

  @Column({ type: 'simple-json' })
  payload!: KieCallbackOutcome;

  @Column({ name: 'received_at', type: Date })
  receivedAt!: Date;

  @Column({ type: 'boolean', default: false })
  processed!: boolean;

  @Column({ name: 'processed_at', type: Date, nullable: true })
  processedAt!: Date | null;

  @Column({ type: 'varchar', length: 16, nullable: true })
  outcome!: OrphanOutcome | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;
}
