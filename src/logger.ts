import winston from 'winston';

export interface LoggingConfig {
  level: string;
  format: 'text' | 'json';
  file?: string;
}

export function createLogger(config: LoggingConfig): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: config.format === 'json'
        ? winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
          )
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
              return `${timestamp} [${level}] ${message}${metaStr}`;
            })
          ),
    }),
  ];

  if (config.file) {
    transports.push(
      new winston.transports.File({
        filename: config.file,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
      })
    );
  }

  return winston.createLogger({
    level: config.level,
    transports,
  });
}
