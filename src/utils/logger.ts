import pino, { type Logger } from 'pino';

const env = process.env['NODE_ENV'];
const isProduction = env === 'production';
const isTest = env === 'test' || process.env['VITEST'] !== undefined;
const logLevel = process.env['LOG_LEVEL'] ?? (isProduction ? 'info' : 'debug');

// stdout carries CLI output, so every log line goes to stderr.
export const logger = isProduction || isTest
  ? pino({ level: logLevel }, pino.destination(2))
  : pino({
      level: logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });

export type { Logger };

export function createChildLogger(name: string): Logger {
  return logger.child({ component: name });
}
