import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.log.level,
  transport: {
    target: 'pino/file',
    options: { destination: 1 }, // stdout
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  // API 키/시크릿/서명은 어떤 경로로도 로그에 남기지 않는다
  redact: {
    paths: [
      'apiKey',
      'apiSecret',
      'keys',
      '*.apiKey',
      '*.apiSecret',
      '*.keys',
      'headers["api-key"]',
      'headers.signature',
      '*.headers["api-key"]',
      '*.headers.signature',
    ],
    censor: '[redacted]',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
