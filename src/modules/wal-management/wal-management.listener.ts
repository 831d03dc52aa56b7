import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { WALCheckpointEvent, WALHealthEvent } from '../../database/services/wal-manager.service';

@Injectable()
export class WALManagementListener {
  private readonly logger = new Logger(WALManagementListener.name);

  @OnEvent('wal.health')
  handleWALHealth(event: WALHealthEvent) {
    if (event.stats.healthStatus === 'critical') {
      this.logger.warn(`WAL critical: ${event.action} - ${event.stats.recommendations.join('; ')}`);
      return;
    }
    this.logger.debug(`WAL Health Event: ${event.action} - ${event.message}`);
  }

  @OnEvent('wal.checkpoint')
  handleWALCheckpoint(event: WALCheckpointEvent) {
    if (event.success) {
      this.logger.log(`WAL Checkpoint Event: ${event.reason} - ${event.message}`);
    } else {
      this.logger.warn(`WAL Checkpoint Event: ${event.reason} failed - ${event.message}`);
    }
  }
}
