import { ConfigService } from '@nestjs/config';

export interface DatabaseConfig {
  path: string;
  busyTimeoutMs: number;
  logging: boolean;
}

export interface WALConfig {
  checkpointThresholdBytes: number;
}

export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  messageBus: {
    host: string;
    port: number;
  };
}

export const DEFAULT_DATABASE_PATH = 'data/alarm-rules.db';

function readInt(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readBoolean(configService: ConfigService, key: string, fallback: boolean): boolean {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(String(raw).toLowerCase());
}

export function readDatabaseConfig(configService: ConfigService): DatabaseConfig {
  return {
    path: configService.get<string>('DATABASE_PATH') || DEFAULT_DATABASE_PATH,
    // DATABASE_TIMEOUT is given in seconds
    busyTimeoutMs: readInt(configService, 'DATABASE_TIMEOUT', 30) * 1000,
    logging: readBoolean(configService, 'DATABASE_LOGGING', false),
  };
}

export function readWALConfig(configService: ConfigService): WALConfig {
  return {
    checkpointThresholdBytes: readInt(configService, 'WAL_CHECKPOINT_THRESHOLD_MB', 64) * 1024 * 1024,
  };
}

export function readServerConfig(configService: ConfigService): ServerConfig {
  const origins = configService.get<string>('CORS_ORIGINS') || '*';
  return {
    port: readInt(configService, 'PORT', 6002),
    corsOrigins: origins.split(',').map((origin) => origin.trim()).filter(Boolean),
    messageBus: {
      host: configService.get<string>('MESSAGE_BUS_HOST') || 'localhost',
      port: readInt(configService, 'MESSAGE_BUS_PORT', 6379),
    },
  };
}
