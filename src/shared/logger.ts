import pino from 'pino';

const level = process.env['LOG_LEVEL'] ?? 'info';
const pretty =
  process.env['NODE_ENV'] !== 'production' && process.env['NODE_ENV'] !== 'test' && level !== 'silent';

export const logger = pino({
  level,
  transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  redact: {
    paths: [
      'password',
      'smtp_pass',
      'secret',
      '*.password',
      '*.smtp_pass',
      'config.database.password',
      'config.delivery.email.smtp_pass',
    ],
    censor: '***REDACTED***',
  },
});

export type Logger = typeof logger;
