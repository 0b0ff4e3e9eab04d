import pino, { Logger } from 'pino';

const isTest = process.env.NODE_ENV === 'test';
const usePretty = !isTest && Boolean(process.stdout.isTTY);

export const rootLogger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  enabled: !isTest,
  redact: ['password', '*.password', 'botToken', '*.botToken'],
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true
          }
        }
      }
    : {})
});

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
