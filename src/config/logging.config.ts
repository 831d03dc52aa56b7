import { LogLevel } from '@nestjs/common';

// Most to least severe; a configured level enables itself and everything above it.
const LOG_LEVEL_ORDER: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export interface LoggingConfig {
  level: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_ORDER as string[]).includes(value);
}

export function readLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const raw = (env.LOG_LEVEL || 'log').toLowerCase();
  // 'info' is accepted as an alias of Nest's 'log'
  const level = raw === 'info' ? 'log' : raw;
  return {
    level: isLogLevel(level) ? level : 'log',
  };
}

export function resolveLogLevels(level: LogLevel): LogLevel[] {
  const index = LOG_LEVEL_ORDER.indexOf(level);
  if (index === -1) {
    return LOG_LEVEL_ORDER.slice(0, 3);
  }
  return LOG_LEVEL_ORDER.slice(0, index + 1);
}
