import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateAlertRuleTable1718000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    // IF NOT EXISTS: databases created before migrations were tracked already have the table
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS alert_rule (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        channel_id    INTEGER NOT NULL CHECK (typeof(channel_id) = 'integer'),
        data_type     TEXT    NOT NULL CHECK (data_type IN ('T', 'S', 'C', 'A')),
        point_id      INTEGER NOT NULL CHECK (typeof(point_id) = 'integer'),
        rule_name     TEXT    NOT NULL CHECK (length(trim(rule_name)) > 0),
        warning_level INTEGER NOT NULL CHECK (warning_level IN (1, 2, 3)),
        operator      TEXT    NOT NULL CHECK (operator IN ('>', '<', '>=', '<=', '==', '!=')),
        value         REAL    NOT NULL,
        enabled       BOOLEAN NOT NULL DEFAULT 1 CHECK (enabled IN (0, 1)),
        description   TEXT    NOT NULL DEFAULT '',
        created_at    INTEGER NOT NULL,
        updated_at    INTEGER NOT NULL,
        CONSTRAINT uq_alert_rule_tuple UNIQUE (channel_id, data_type, point_id, rule_name)
      );
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_alert_rule_channel_type_point ON alert_rule(channel_id, data_type, point_id);
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_alert_rule_enabled ON alert_rule(enabled);
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_alert_rule_warning_level ON alert_rule(warning_level);
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_alert_rule_created_at ON alert_rule(created_at);
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS alert_rule;`);
  }
}
