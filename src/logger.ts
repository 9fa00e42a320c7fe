import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const lineFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta, errorReplacer)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
});

// Error instances serialize to {} by default
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.colorize(),
    lineFormat,
  ),
  transports: [new winston.transports.Console({ stderrLevels: ['error'] })],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
