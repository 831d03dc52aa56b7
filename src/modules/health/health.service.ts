import { Injectable } from '@nestjs/common';
import { AlertRuleStore } from '../../database/services/alert-rule-store.service';

export interface DatabaseHealth {
  timestamp: string;
  status: 'ok' | 'error';
  journalMode: string | null;
  rules: { total: number; enabled: number } | null;
  error: string | null;
}

@Injectable()
export class HealthService {
  constructor(private readonly store: AlertRuleStore) {}

  checkHealth() {
    const uptime = process.uptime();
    const memoryUsage = process.memoryUsage();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: `${Math.floor(uptime / 3600)}h ${Math.floor((uptime % 3600) / 60)}m ${Math.floor(uptime % 60)}s`,
      memory: {
        rss: `${Math.round(memoryUsage.rss / 1024 / 1024)}MB`,
        heapUsed: `${Math.round(memoryUsage.heapUsed / 1024 / 1024)}MB`,
        heapTotal: `${Math.round(memoryUsage.heapTotal / 1024 / 1024)}MB`,
      },
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
    };
  }

  async checkDatabaseHealth(): Promise<DatabaseHealth> {
    const timestamp = new Date().toISOString();

    try {
      const [journalMode, total, enabled] = await Promise.all([
        this.store.getJournalMode(),
        this.store.count(),
        this.store.countEnabled(),
      ]);
      return {
        timestamp,
        status: journalMode === 'wal' ? 'ok' : 'error',
        journalMode,
        rules: { total, enabled },
        error: journalMode === 'wal' ? null : `Unexpected journal mode "${journalMode}"`,
      };
    } catch (error) {
      return {
        timestamp,
        status: 'error',
        journalMode: null,
        rules: null,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
