import winston from 'winston';

const { combine, timestamp, errors, splat, json, colorize, printf } = winston.format;

const nodeEnv = process.env.NODE_ENV || 'development';

const developmentFormat = printf(({ level, message, timestamp: time, stack, ...meta }) => {
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${time} ${level}: ${stack ?? message}${details}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    errors({ stack: true }),
    splat(),
    nodeEnv === 'development' ? combine(colorize(), developmentFormat) : json()
  ),
  transports: [new winston.transports.Console()],
  silent: nodeEnv === 'test'
});

// morgan writes one access line per request into this stream
export const httpLogStream = {
  write: (message: string): void => {
    logger.http(message.trim());
  }
};
