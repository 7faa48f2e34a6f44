import { MigrationInterface, QueryRunner, TableColumn } from 'typeorm';

// Статус сироты отдельной колонкой, чтобы условие перезаписи проверялось в UPDATE
export class AddOrphanStatus1760861100000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.addColumn(
      'orphan_callbacks',
      new TableColumn({ name: 'status', type: 'varchar', length: '16', default: "'running'" }),
    );
    if (queryRunner.connection.driver.options.type === 'postgres') {
      await queryRunner.query(`UPDATE "orphan_callbacks" SET "status" = "payload"::json->>'status'`);
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropColumn('orphan_callbacks', 'status');
  }
}
