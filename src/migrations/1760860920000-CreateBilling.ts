import { MigrationInterface, QueryRunner, Table } from 'typeorm';

// Кошельки пользователей и журнал движения токенов
export class CreateBilling1760860920000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'wallets',
        columns: [
          { name: 'user_id', type: 'varchar', length: '32', isPrimary: true },
          { name: 'balance', type: 'integer', default: 0 },
          { name: 'hold', type: 'integer', default: 0 },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
    );
    await queryRunner.createTable(
      new Table({
        name: 'ledger_entries',
        columns: [
          { name: 'id', type: 'integer', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
          { name: 'user_id', type: 'varchar', length: '32' },
          { name: 'kind', type: 'varchar', length: '16' },
          { name: 'amount', type: 'integer' },
          { name: 'ref', type: 'varchar', length: '128', isUnique: true },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
        indices: [{ name: 'IDX_ledger_entries_user', columnNames: ['user_id'] }],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('ledger_entries');
    await queryRunner.dropTable('wallets');
  }
}
