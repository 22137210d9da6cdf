import winston from 'winston';
import config from '../config';

const consoleFormat = config.env === 'production'
  ? winston.format.json()
  : winston.format.combine(winston.format.colorize(), winston.format.simple());

const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'trophic-diversity' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      silent: config.env === 'test',
    }),
  ],
});

export default logger;
