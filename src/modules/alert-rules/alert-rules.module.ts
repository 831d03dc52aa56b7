import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { AlertRulesController } from './alert-rules.controller';
import { AlertRulesService } from './alert-rules.service';
import { AlertRulesListener } from './alert-rules.listener';

@Module({
  imports: [DatabaseModule],
  controllers: [AlertRulesController],
  providers: [AlertRulesService, AlertRulesListener],
  exports: [AlertRulesService],
})
export class AlertRulesModule {}
