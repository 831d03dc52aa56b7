import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AlertRule } from './entities/alert-rule.entity';
import { AlertRuleStore } from './services/alert-rule-store.service';
import { buildDataSourceOptions } from './data-source';
import { readDatabaseConfig } from '../config/app.config';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        ...buildDataSourceOptions(readDatabaseConfig(configService)),
        // a database that cannot be opened is fatal at startup
        retryAttempts: 0,
      }),
      inject: [ConfigService],
    }),
    TypeOrmModule.forFeature([AlertRule]),
  ],
  providers: [AlertRuleStore],
  exports: [TypeOrmModule, AlertRuleStore],
})
export class DatabaseModule {}
