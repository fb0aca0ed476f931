/**
 * Logger configuration for the voice tutor service
 */
import pino from 'pino';
import Config from '../config';

// Create a logger instance
export const logger = pino({
  level: Config.logging.level,
  name: Config.service.name,

  // Use pretty printing in development
  transport: Config.logging.prettyPrint
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,

  // Collaborator failures are logged under `error`, not pino's default `err`
  serializers: {
    error: pino.stdSerializers.err,
  },

  // Never let credentials reach the log stream
  redact: ['apiKey', '*.apiKey', 'headers.authorization'],

  // Include basic app info in all logs
  base: {
    app: Config.service.name,
    version: Config.service.version,
    env: process.env.NODE_ENV || 'development',
  },
});

export default logger;
