import { LoggerService } from "@nestjs/common";
import { pino, type Logger as PinoLogger } from "pino";

/**
 * File descriptor constants for logger output destinations
 */
export const LOG_DESTINATION = {
  /** stdout (fd 1) */
  STDOUT: 1,
  /** stderr (fd 2) - default, keeps stdout for the user-facing CLI output */
  STDERR: 2,
} as const;

export type LogDestination =
  (typeof LOG_DESTINATION)[keyof typeof LOG_DESTINATION];

/**
 * Creates a Pino logger writing pretty-printed lines to the given descriptor
 *
 * @param destination - LOG_DESTINATION.STDERR unless output is redirected on purpose
 * @param logLevel - Log level (debug, info, warn, error). Defaults to 'info'
 */
export function createPinoLogger(
  destination: LogDestination,
  logLevel: string = "info",
): PinoLogger {
  return pino({
    level: logLevel,
    redact: ["sourceAccessToken", "destinationAccessToken", "*.sourceAccessToken"],
    transport: {
      target: "pino-pretty",
      options: {
        destination,
        colorize: true,
        translateTime: "HH:MM:ss Z",
        ignore: "pid,hostname",
      },
    },
  });
}

function stringify(message: unknown): string {
  if (typeof message === "string") {
    return message;
  }
  if (message instanceof Error) {
    return message.message;
  }
  return JSON.stringify(message);
}

/**
 * Creates a NestJS-compatible logger service from a Pino logger
 */
export function createLoggerService(pinoLogger: PinoLogger): LoggerService {
  return {
    log: (message: unknown, context?: string) => {
      pinoLogger.info({ context }, stringify(message));
    },
    error: (message: unknown, trace?: string, context?: string) => {
      pinoLogger.error({ context, trace }, stringify(message));
    },
    warn: (message: unknown, context?: string) => {
      pinoLogger.warn({ context }, stringify(message));
    },
    debug: (message: unknown, context?: string) => {
      pinoLogger.debug({ context }, stringify(message));
    },
    verbose: (message: unknown, context?: string) => {
      pinoLogger.trace({ context }, stringify(message));
    },
  };
}
