import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogLevel, PositionChange } from '../types';

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

const parseLogLevel = (value: string | undefined): LogLevel => {
  const level = (value || LogLevel.INFO).toLowerCase();
  const match = Object.values(LogLevel).find((candidate) => candidate === level);
  if (!match) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return match;
};

const envLogLevel = parseLogLevel(process.env.LOG_LEVEL);
const logToFile = (process.env.LOG_TO_FILE || 'false').toLowerCase() === 'true';

// BigInt serialization helper
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString() + 'n';
  }
  return value;
};

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta, bigIntReplacer)}` : '';
    return `[${timestamp}] ${level}: ${message}${metaString}`;
  }),
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf((info) => JSON.stringify(info, bigIntReplacer)),
);

const transports: winston.transport[] = [
  new winston.transports.Console({ level: envLogLevel, format: consoleFormat }),
];

if (logToFile) {
  const mkRotate = (level: LogLevel) =>
    new DailyRotateFile({
      level,
      dirname: 'logs',
      filename: `%DATE%-${level}.log`,
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      maxSize: '20m',
      zippedArchive: false,
      format: fileFormat,
    });

  transports.push(mkRotate(LogLevel.ERROR)); // errors only
  transports.push(mkRotate(LogLevel.WARN));
  transports.push(mkRotate(LogLevel.INFO));
}

export const logger = winston.createLogger({
  level: envLogLevel,
  transports,
});

export const logClientConnected = (payload: { address: string; chainId: bigint; endpoint: string }): void => {
  logger.info('GMX client connected', payload);
};

export const logPositionChange = (change: PositionChange): void => {
  logger.info('Position change detected', {
    account: change.account,
    round: change.round,
    before: change.before.length,
    after: change.after.length,
    added: change.added.map((position) => position.positionId),
    removed: change.removed.map((position) => position.positionId),
    modified: change.modified.map((delta) => delta.positionId),
  });
};
