import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Database } from 'better-sqlite3';
import type { BetterSqlite3ConnectionOptions } from 'typeorm/driver/better-sqlite3/BetterSqlite3ConnectionOptions';
import { DatabaseConfig } from '../config/app.config';
import { AlertRule } from './entities/alert-rule.entity';
import { CreateAlertRuleTable1718000000000 } from './migrations/1718000000000-create-alert-rule-table';

export function ensureDatabaseDirectory(databasePath: string): void {
  if (databasePath === ':memory:') {
    return;
  }
  mkdirSync(dirname(databasePath), { recursive: true });
}

/**
 * Options for the rule database: a single SQLite file in WAL mode whose schema
 * is created by the (idempotent) migrations on every start.
 */
export function buildDataSourceOptions(config: DatabaseConfig): BetterSqlite3ConnectionOptions {
  ensureDatabaseDirectory(config.path);

  return {
    type: 'better-sqlite3',
    database: config.path,
    enableWAL: true,
    timeout: config.busyTimeoutMs,
    prepareDatabase: (db: Database) => {
      db.pragma('synchronous = NORMAL');
      db.pragma('temp_store = MEMORY');
      db.pragma('foreign_keys = ON');
    },
    entities: [AlertRule],
    migrations: [CreateAlertRuleTable1718000000000],
    migrationsRun: true,
    synchronize: false,
    logging: config.logging,
  };
}
