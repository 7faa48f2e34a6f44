import { MigrationInterface, QueryRunner, Table } from 'typeorm';

// Журнал callback-ов без задачи
export class CreateOrphanCallbacks1760860860000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'orphan_callbacks',
        columns: [
          { name: 'task_id', type: 'varchar', length: '128', isPrimary: true },
          { name: 'payload', type: 'text' },
          { name: 'received_at', type: 'timestamp' },
          { name: 'processed', type: 'boolean', default: false },
          { name: 'processed_at', type: 'timestamp', isNullable: true },
          { name: 'outcome', type: 'varchar', length: '16', isNullable: true },
          { name: 'error', type: 'text', isNullable: true },
        ],
        indices: [{ name: 'IDX_orphan_callbacks_pending', columnNames: ['processed', 'received_at'] }],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('orphan_callbacks');
  }
}
