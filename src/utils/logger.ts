import winston from 'winston';
import path from 'path';
import config from '../config/environment';

const { combine, timestamp, printf, colorize, errors, splat } = winston.format;

const lineFormat = printf(({ level, message, timestamp: ts, stack }) =>
  stack ? `${ts} [${level}] ${message}\n${stack}` : `${ts} [${level}] ${message}`
);

const transports = [
  new winston.transports.Console({
    format: combine(colorize(), lineFormat),
  }),
  // No log files from test runs
  ...(config.env === 'test'
    ? []
    : [
        new winston.transports.File({
          filename: path.join(config.logging.dir, 'error.log'),
          level: 'error',
        }),
        new winston.transports.File({
          filename: path.join(config.logging.dir, 'combined.log'),
        }),
      ]),
];

const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(errors({ stack: true }), splat(), timestamp(), lineFormat),
  transports,
});

export default logger;
