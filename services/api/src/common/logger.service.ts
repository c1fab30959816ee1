import { Inject, Injectable, Optional } from '@nestjs/common';
import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { loadConfig } from './config';

export const PINO_LOGGER = Symbol('PINO_LOGGER');

export function createLogger(destination?: DestinationStream): Logger {
  const config = loadConfig();
  const options = {
    level: config.LOG_LEVEL,
    base: {
      service: 'flashwear',
      env: config.NODE_ENV,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}

@Injectable()
export class LoggerService {
  private readonly logger: Logger;

  constructor(@Optional() @Inject(PINO_LOGGER) logger?: Logger) {
    this.logger = logger ?? createLogger();
  }

  info(message: string, context?: Record<string, unknown>) {
    this.logger.info(context ?? {}, message);
  }

  error(message: string, context?: Record<string, unknown>) {
    this.logger.error(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.logger.warn(context ?? {}, message);
  }
}
