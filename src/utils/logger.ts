import winston from 'winston';

const { combine, timestamp, errors, splat, colorize, printf } = winston.format;

const lineFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const text = typeof stack === 'string' ? `${message}\n${stack}` : String(message);
  return `${String(ts)} [${level}] ${text}`;
});

const logFile = process.env.LOG_FILE;

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(timestamp(), errors({ stack: true }), splat()),
  transports: [
    new winston.transports.Console({ format: combine(colorize(), lineFormat) }),
    ...(logFile ? [new winston.transports.File({ filename: logFile, format: lineFormat })] : []),
  ],
  silent: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
});

export default logger;
