import { createLogger, format, transports } from 'winston';

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'escrow-core' },
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  transports: [
    new transports.Console({
      silent: process.env.NODE_ENV === 'test',
      format: format.combine(
        format.colorize(),
        format.simple()
      )
    })
  ]
});
