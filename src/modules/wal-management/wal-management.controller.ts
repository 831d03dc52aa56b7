import { Controller, Get, Post, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { WALManagerService } from '../../database/services/wal-manager.service';

@ApiTags('WAL Management')
@Controller('wal-management')
export class WALManagementController {
  constructor(private readonly walManagerService: WALManagerService) {}

  @Get('health')
  @ApiOperation({ summary: 'Journal mode, WAL file size against its threshold, and checkpoint cooldown' })
  @ApiResponse({ status: 200, description: 'WAL statistics' })
  async getWALHealth() {
    const stats = await this.walManagerService.getWALStats();
    return {
      success: stats.healthStatus !== 'critical',
      message: `WAL is ${stats.healthStatus} at ${stats.walSizeMB.toFixed(2)}MB of ${stats.thresholdMB}MB`,
      data: {
        ...stats,
        checkpoint: this.walManagerService.getCheckpointStatus(),
      },
    };
  }

  @Post('checkpoint')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run PRAGMA wal_checkpoint(TRUNCATE) unless the cooldown is active' })
  @ApiResponse({ status: 200, description: 'Outcome of the checkpoint request' })
  async forceCheckpoint() {
    const before = this.walManagerService.getCheckpointStatus();
    if (before.cooldownActive) {
      return {
        success: false,
        message: `Checkpoint cooldown active for another ${Math.ceil(before.cooldownRemainingMs / 1000)}s`,
        data: { checkpoint: before },
      };
    }

    const success = await this.walManagerService.forceCheckpoint();
    const stats = await this.walManagerService.getWALStats();
    return {
      success,
      message: success ? 'WAL checkpointed and truncated' : 'Checkpoint could not complete',
      data: {
        walSizeMB: stats.walSizeMB,
        checkpoint: this.walManagerService.getCheckpointStatus(),
      },
    };
  }
}
