/**
 * Structured logging with pino
 */

import pino from 'pino';
import type { CardBuildError, CardSize, Platform } from '../types';
import { logLevelSchema } from './config';

// An invalid LOG_LEVEL is reported by loadConfig; server.ts sets the validated level
const envLevel = logLevelSchema.safeParse(process.env.LOG_LEVEL);

export const logger = pino({
  level: envLevel.success ? envLevel.data : 'info',
  base: { service: 'social-card-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export interface RequestLog {
  method: string;
  path: string;
  statusCode: number;
  responseTime: number;
  userAgent?: string;
  ip?: string;
}

export function logRequest(entry: RequestLog) {
  const level = entry.statusCode >= 500 ? 'error' : entry.statusCode >= 400 ? 'warn' : 'info';
  logger[level](entry, `${entry.method} ${entry.path} ${entry.statusCode} ${entry.responseTime}ms`);
}

export interface CardBuildLog {
  platform: Platform;
  site: string;
  success: boolean;
  size?: CardSize;
  error?: CardBuildError;
}

export function logCardBuild(entry: CardBuildLog) {
  if (entry.success) {
    logger.debug(entry, `Built ${entry.platform} card for ${entry.site}`);
  } else {
    logger.info(entry, `No ${entry.platform} card for ${entry.site}: ${entry.error}`);
  }
}
