import winston from 'winston';
import { config } from './config';

const { combine, timestamp, errors, json } = winston.format;

export const logger = winston.createLogger({
  level: config.logLevel === 'silent' ? 'error' : config.logLevel,
  silent: config.logLevel === 'silent',
  format: combine(errors({ stack: true }), timestamp(), json()),
  defaultMeta: { service: 'wasteland-settlers' },
  transports: [new winston.transports.Console()]
});

export function createComponentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
