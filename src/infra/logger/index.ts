/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels.
 *
 * Logs go to stderr: stdout carries the MCP stdio protocol.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const STDERR_FD = 2;

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'metabase-parameter-bridge',
  pretty: process.env['NODE_ENV'] === 'development',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR_FD,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(STDERR_FD));
};

export { type Logger } from 'pino';
