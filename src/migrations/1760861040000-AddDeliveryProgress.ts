import { MigrationInterface, QueryRunner, TableColumn } from 'typeorm';

// Захват доставки и число уже отправленных ссылок
export class AddDeliveryProgress1760861040000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.addColumns('generation_jobs', [
      new TableColumn({ name: 'delivery_claimed_until', type: 'timestamp', isNullable: true }),
      new TableColumn({ name: 'sent_count', type: 'integer', default: 0 }),
    ]);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropColumn('generation_jobs', 'sent_count');
    await queryRunner.dropColumn('generation_jobs', 'delivery_claimed_until');
  }
}
