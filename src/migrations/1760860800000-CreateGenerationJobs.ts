import { MigrationInterface, QueryRunner, Table } from 'typeorm';

// Таблица задач генерации
export class CreateGenerationJobs1760860800000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'generation_jobs',
        columns: [
          { name: 'id', type: 'varchar', length: '36', isPrimary: true },
          { name: 'task_id', type: 'varchar', length: '128', isNullable: true, isUnique: true },
          { name: 'user_id', type: 'varchar', length: '32' },
          { name: 'chat_id', type: 'varchar', length: '32' },
          { name: 'model', type: 'varchar', length: '128' },
          { name: 'input', type: 'text' },
          { name: 'status', type: 'varchar', length: '16' },
          { name: 'result_urls', type: 'text' },
          { name: 'error_text', type: 'text', isNullable: true },
          { name: 'price', type: 'integer', default: 0 },
          { name: 'idempotency_key', type: 'varchar', length: '128', isNullable: true, isUnique: true },
          { name: 'delivered', type: 'boolean', default: false },
          { name: 'delivered_at', type: 'timestamp', isNullable: true },
          { name: 'delivery_attempts', type: 'integer', default: 0 },
          { name: 'last_delivery_error', type: 'text', isNullable: true },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'finished_at', type: 'timestamp', isNullable: true },
        ],
        indices: [
          { name: 'IDX_generation_jobs_undelivered', columnNames: ['status', 'delivered'] },
          { name: 'IDX_generation_jobs_user', columnNames: ['user_id', 'created_at'] },
        ],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('generation_jobs');
  }
}
