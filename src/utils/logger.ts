import winston from 'winston';

const REDACTED_FIELDS = new Set([
  'apiKey',
  'apiSecret',
  'jwtToken',
  'starknetPrivateKey',
  'signature',
  'authorization'
]);

const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (REDACTED_FIELDS.has(key)) {
      info[key] = '[REDACTED]';
    }
  }
  return info;
});

const isProduction = process.env.NODE_ENV === 'production';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    redactSecrets(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.timestamp(),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'volume-aggregator' },
  transports: [new winston.transports.Console()]
});

export default logger;
