import winston from 'winston';
import path from 'path';
import { config } from './config';

const SERVICE_NAME = 'dgml-builder';

const logDir = path.dirname(config.logging.file);

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const extraKeys = Object.keys(meta).filter(key => key !== 'service');

    let output = `${timestamp} [${level}]: ${message}`;

    if (component && component !== SERVICE_NAME) {
      output += ` (${component})`;
    }

    if (extraKeys.length > 0) {
      const extra: Record<string, unknown> = {};
      for (const key of extraKeys) {
        extra[key] = meta[key];
      }
      // Keep console lines short; the file transport has the full record
      const serialized = JSON.stringify(extra);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

const isTest = config.nodeEnv === 'test';

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: SERVICE_NAME },
  transports: isTest
    ? [new winston.transports.Console({ silent: true })]
    : [
        new winston.transports.File({
          filename: config.logging.file,
          maxsize: 5 * 1024 * 1024, // 5MB
          maxFiles: 5,
        }),
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 5 * 1024 * 1024,
          maxFiles: 5,
        }),
      ],
});

if (config.nodeEnv !== 'production' && !isTest) {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
      level: 'warn', // CLI output carries progress; console logging is for problems
    })
  );
}

export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setTimeout(resolve, 200);
    });
  });
};
