import pino from 'pino';

import { config } from '@config/env.config';

type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const base = pino({
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  base: { service: 'order-alert-orchestrator' },
  serializers: { err: pino.stdSerializers.err },
});

// message first, context second; pino takes them the other way round
function bind(level: 'debug' | 'info' | 'warn' | 'error') {
  return (message: string, context?: LogContext) => {
    if (context) {
      base[level](context, message);
    } else {
      base[level](message);
    }
  };
}

export const logger: Logger = {
  debug: bind('debug'),
  info: bind('info'),
  warn: bind('warn'),
  error: bind('error'),
};
