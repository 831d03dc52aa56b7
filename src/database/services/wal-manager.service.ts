import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { stat } from 'fs/promises';
import { AlertRuleStore, CheckpointResult } from './alert-rule-store.service';
import { readDatabaseConfig, readWALConfig } from '../../config/app.config';

export type WALHealthStatus = 'healthy' | 'warning' | 'critical';

export interface WALStats {
  journalMode: string;
  walSizeBytes: number;
  walSizeMB: number;
  thresholdMB: number;
  lastCheckpoint: Date | null;
  healthStatus: WALHealthStatus;
  recommendations: string[];
}

export interface WALHealthEvent {
  timestamp: Date;
  stats: WALStats;
  action: string;
  success: boolean;
  message: string;
}

export interface WALCheckpointEvent {
  timestamp: Date;
  reason: string;
  success: boolean;
  message: string;
  result?: CheckpointResult;
}

export interface CheckpointStatus {
  lastCheckpoint: Date | null;
  cooldownActive: boolean;
  cooldownRemainingMs: number;
}

const BYTES_PER_MB = 1024 * 1024;

// fs errors may come from another realm (e.g. under a test VM), so check the shape
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export const WAL_HEALTH_CRON = '0 */2 * * * *';

@Injectable()
export class WALManagerService {
  private readonly logger = new Logger(WALManagerService.name);
  private isProcessing = false;
  private lastCheckpoint: Date | null = null;
  private readonly walPath: string;
  private readonly thresholdBytes: number;
  // critical once the WAL has grown to this many thresholds
  private readonly CRITICAL_FACTOR = 4;
  private readonly CHECKPOINT_COOLDOWN_MS = 5 * 60 * 1000; // 5 minutes

  constructor(
    private readonly store: AlertRuleStore,
    configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.walPath = `${readDatabaseConfig(configService).path}-wal`;
    this.thresholdBytes = readWALConfig(configService).checkpointThresholdBytes;
  }

  @Cron(WAL_HEALTH_CRON)
  async monitorWALHealth() {
    if (this.isProcessing) {
      this.logger.debug('WAL management already in progress, skipping...');
      return;
    }

    try {
      this.isProcessing = true;
      await this.performWALHealthCheck();
    } catch (error) {
      this.logger.error('Failed to perform WAL health check', error instanceof Error ? error.stack : error);
    } finally {
      this.isProcessing = false;
    }
  }

  @Cron(CronExpression.EVERY_10_MINUTES)
  async scheduledCheckpoint() {
    if (this.isProcessing) return;

    try {
      this.isProcessing = true;
      const stats = await this.getWALStats();

      if (stats.walSizeBytes >= this.thresholdBytes) {
        await this.triggerCheckpoint('scheduled');
      }
    } catch (error) {
      this.logger.error('Failed to perform scheduled checkpoint', error instanceof Error ? error.stack : error);
    } finally {
      this.isProcessing = false;
    }
  }

  async performWALHealthCheck(): Promise<WALHealthEvent> {
    const stats = await this.getWALStats();
    const healthEvent: WALHealthEvent = {
      timestamp: new Date(),
      stats,
      action: 'health_check',
      success: true,
      message: 'WAL health check completed',
    };

    if (stats.healthStatus === 'critical') {
      this.logger.warn(`CRITICAL WAL status: mode=${stats.journalMode}, ${stats.walSizeMB.toFixed(2)}MB`);
      if (stats.journalMode === 'wal') {
        healthEvent.success = await this.triggerCheckpoint('critical');
      }
      healthEvent.action = 'critical_intervention';
    } else if (stats.healthStatus === 'warning') {
      this.logger.warn(`WAL above threshold: ${stats.walSizeMB.toFixed(2)}MB`);
      healthEvent.success = await this.triggerCheckpoint('warning');
      healthEvent.action = 'warning_intervention';
    } else {
      this.logger.debug(`WAL health normal: ${stats.walSizeMB.toFixed(2)}MB`);
    }

    this.eventEmitter.emit('wal.health', healthEvent);
    return healthEvent;
  }

  async getWALStats(): Promise<WALStats> {
    const [journalMode, walSizeBytes] = await Promise.all([this.store.getJournalMode(), this.readWALSize()]);
    const healthStatus = this.determineHealthStatus(journalMode, walSizeBytes);

    return {
      journalMode,
      walSizeBytes,
      walSizeMB: walSizeBytes / BYTES_PER_MB,
      thresholdMB: this.thresholdBytes / BYTES_PER_MB,
      lastCheckpoint: this.lastCheckpoint,
      healthStatus,
      recommendations: this.generateRecommendations(journalMode, healthStatus),
    };
  }

  getCheckpointStatus(now: number = Date.now()): CheckpointStatus {
    const elapsed = this.lastCheckpoint ? now - this.lastCheckpoint.getTime() : Infinity;
    const remaining = Math.max(0, this.CHECKPOINT_COOLDOWN_MS - elapsed);
    return {
      lastCheckpoint: this.lastCheckpoint,
      cooldownActive: remaining > 0,
      cooldownRemainingMs: remaining,
    };
  }

  /** Manual checkpoint; refused while the cooldown of the previous one runs. */
  async forceCheckpoint(): Promise<boolean> {
    if (this.getCheckpointStatus().cooldownActive) {
      this.logger.warn('Checkpoint cooldown active, skipping forced checkpoint');
      return false;
    }
    return this.triggerCheckpoint('manual');
  }

  private async triggerCheckpoint(reason: string): Promise<boolean> {
    const event: WALCheckpointEvent = {
      timestamp: new Date(),
      reason,
      success: false,
      message: '',
    };

    try {
      const result = await this.store.checkpoint('TRUNCATE');
      this.lastCheckpoint = new Date();
      // busy = 1 means a reader or writer kept the checkpoint from finishing
      event.success = result.busy === 0;
      event.result = result;
      event.message = event.success
        ? `Checkpointed ${result.checkpointed} of ${result.log} WAL frames`
        : 'Checkpoint could not complete while the database was busy';
      this.logger.log(`WAL checkpoint (${reason}): ${event.message}`);
    } catch (error) {
      event.message = error instanceof Error ? error.message : String(error);
      this.logger.error(`WAL checkpoint (${reason}) failed: ${event.message}`);
    }

    this.eventEmitter.emit('wal.checkpoint', event);
    return event.success;
  }

  private async readWALSize(): Promise<number> {
    try {
      const info = await stat(this.walPath);
      return info.size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }
  }

  private determineHealthStatus(journalMode: string, walSizeBytes: number): WALHealthStatus {
    if (journalMode !== 'wal' || walSizeBytes >= this.thresholdBytes * this.CRITICAL_FACTOR) {
      return 'critical';
    }
    if (walSizeBytes >= this.thresholdBytes) {
      return 'warning';
    }
    return 'healthy';
  }

  private generateRecommendations(journalMode: string, healthStatus: WALHealthStatus): string[] {
    const recommendations: string[] = [];

    if (journalMode !== 'wal') {
      recommendations.push(`Journal mode is "${journalMode}"; restart the service to re-enable WAL`);
    }
    if (healthStatus !== 'healthy' && journalMode === 'wal') {
      recommendations.push('Long-running readers block checkpoints; check for stuck connections');
      recommendations.push('Force a checkpoint via POST /wal-management/checkpoint');
    }
    if (recommendations.length === 0) {
      recommendations.push('WAL size is within normal limits');
    }

    return recommendations;
  }
}
