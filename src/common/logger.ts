/**
 * Module Logger Factory
 *
 * Every service gets its own winston logger tagged with a `service` field,
 * so log lines from the catalog, artifact store and generator can be told apart.
 */
import { createLogger, transports, format, Logger } from 'winston';

export function createModuleLogger(service: string): Logger {
  return createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: format.combine(
      format.timestamp(),
      format.json()
    ),
    defaultMeta: { service },
    transports: [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          format.simple()
        ),
      }),
    ],
  });
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
