/**
 * Pino logger and structured log helpers
 */

import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'markup-metadata' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  responseTime: number;
  userAgent?: string;
  origin?: string;
}

export function logRequest(data: RequestLogData): void {
  logger.info({ type: 'request', ...data }, `${data.method} ${data.path} ${data.statusCode}`);
}

export interface ExtractionLogData {
  sourceUrl: string | null;
  techniques: readonly string[];
  candidates: Record<string, number>;
  duration: number;
}

export function logExtraction(data: ExtractionLogData): void {
  logger.info({ type: 'extraction', ...data }, 'Metadata extracted');
}
