import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

/**
 * Package logger. Structured JSON lines; metadata goes in the second argument:
 * `logger.info('Cleaning sales data', { identity })`.
 */
const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'data-ingestion' },
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === 'test'
});

export type Logger = Pick<winston.Logger, 'info' | 'warn' | 'error' | 'debug'>;

export default logger;
