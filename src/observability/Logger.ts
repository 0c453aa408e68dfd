// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = ['apiKey', 'authorization', 'Authorization', 'cookie', 'Cookie'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactKeys(record: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...record };
    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }
    return redacted;
  }

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return obj;

    const redacted = this.redactKeys({ ...obj });

    // Request headers may carry cookies or auth passed through from settings
    const headers = redacted.headers;
    if (headers && typeof headers === 'object' && !Array.isArray(headers)) {
      redacted.headers = this.redactKeys({ ...headers });
    }

    return redacted;
  }

  private sanitize(meta?: Record<string, unknown>): unknown {
    return meta ? this.redactSensitive(meta) : {};
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, this.sanitize(meta));
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, this.sanitize(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, this.sanitize(meta));
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, this.sanitize(meta));
  }
}
