import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { WALManagementController } from './wal-management.controller';
import { WALManagerService } from '../../database/services/wal-manager.service';
import { WALManagementListener } from './wal-management.listener';

@Module({
  imports: [DatabaseModule],
  controllers: [WALManagementController],
  providers: [WALManagerService, WALManagementListener],
  exports: [WALManagerService],
})
export class WALManagementModule {}
