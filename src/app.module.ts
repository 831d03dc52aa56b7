import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { DatabaseModule } from './database/database.module';
import { AlertRulesModule } from './modules/alert-rules/alert-rules.module';
import { HealthModule } from './modules/health/health.module';
import { WALManagementModule } from './modules/wal-management/wal-management.module';
import {
  ConstraintViolationFilter,
  DuplicateRuleFilter,
  RuleNotFoundFilter,
  RuleValidationFilter,
  StorageUnavailableFilter,
} from './common/filters';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ScheduleModule.forRoot(),
    EventEmitterModule.forRoot(),
    DatabaseModule,
    AlertRulesModule,
    HealthModule,
    WALManagementModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: RuleValidationFilter },
    { provide: APP_FILTER, useClass: DuplicateRuleFilter },
    { provide: APP_FILTER, useClass: RuleNotFoundFilter },
    { provide: APP_FILTER, useClass: ConstraintViolationFilter },
    { provide: APP_FILTER, useClass: StorageUnavailableFilter },
  ],
})
export class AppModule {}
