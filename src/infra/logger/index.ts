/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'county-case-tracker',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Transport options shared by the standalone logger and Fastify's logger,
 * so both render the same way in development.
 */
export const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
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
    options.transport = prettyTransport;
  }

  return pinoLib(options);
};

/**
 * Creates a child logger scoped to one module (e.g. `epi-dataset`).
 */
export const createModuleLogger = (parent: Logger, module: string): Logger => {
  return parent.child({ module });
};

export { type Logger } from 'pino';
