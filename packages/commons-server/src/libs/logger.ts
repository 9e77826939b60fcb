import { createLogger, format, Logger, transports } from 'winston';

export type LoggerOptions = {
  level?: string;
  silent?: boolean;
  // also write JSON lines to this file
  logFile?: string;
};

/**
 * Create a winston logger writing JSON lines with a timestamp to the console
 *
 * @param options
 * @returns
 */
export const createLoggerInstance = (options: LoggerOptions = {}): Logger => {
  const loggerTransports: Logger['transports'] = [
    new transports.Console({ silent: options.silent })
  ];

  if (options.logFile) {
    loggerTransports.push(new transports.File({ filename: options.logFile }));
  }

  return createLogger({
    level: options.level ?? 'info',
    format: format.combine(format.timestamp(), format.json()),
    transports: loggerTransports
  });
};
